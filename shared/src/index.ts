// Root barrel. Grouped re-exports delegate to per-directory barrels to keep exports close to implementation.

export * from './confidenceBand.js'
export * from './exceptions/index.js'
export * from './extraction/index.js'
export * from './hash.js'
export * from './language/index.js'
export * from './locatorOrder.js'
export * from './prompts/index.js'
export * from './specModels.js'
export * from './telemetryEvents.js'
export * from './terminology/index.js'
export * from './time/IClock.js'
