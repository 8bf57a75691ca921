export * from './canonicalTerms.js'
export * from './similarity.js'
export * from './termKey.js'
export * from './unitFamilies.js'
