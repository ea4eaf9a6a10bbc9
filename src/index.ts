// Pipeline
export * from './orchestrator/index.js'

// Building blocks
export * from './document/index.js'
export * from './detection/index.js'
export * from './classification/index.js'
export * from './hitl/index.js'
export * from './prompt/index.js'
export * from './provider/index.js'

// Ambient stack
export * from './config/index.js'
export * from './audit/index.js'
