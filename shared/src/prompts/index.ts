export * from './fewShotExamples.js'
export * from './pipelineMessages.js'
export * from './templates.js'
