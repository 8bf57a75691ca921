export * from './extractionSchema.js'
export * from './relevanceSchema.js'
