export { matchesFilter, type AuditStore, type AuditFilter } from './interface.js'
export { JsonlAuditStore } from './jsonl.js'
export { MemoryAuditStore } from './memory.js'
