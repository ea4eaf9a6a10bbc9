export * from './pii/index.js'
export * from './safety/index.js'
export { SEVERITY_RANK, maxSeverity, clampScore, type Severity } from './severity.js'
