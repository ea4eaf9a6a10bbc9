/**
 * Audit event categories.
 */
export const AUDIT_CATEGORIES = [
  'classification', // Pipeline runs and their outcome
  'detection', // PII and content safety results
  'hitl', // Review decisions
  'provider', // Model calls
  'config', // Configuration problems
] as const

export type AuditCategory = (typeof AUDIT_CATEGORIES)[number]

/**
 * Audit event severity levels, lowest first.
 */
export const AUDIT_SEVERITIES = ['debug', 'info', 'warning', 'alert', 'critical'] as const

export type AuditSeverity = (typeof AUDIT_SEVERITIES)[number]

/**
 * Check whether a severity is at or above a minimum.
 */
export function meetsSeverity(severity: AuditSeverity, minimum: AuditSeverity): boolean {
  return AUDIT_SEVERITIES.indexOf(severity) >= AUDIT_SEVERITIES.indexOf(minimum)
}

// NOTE: AuditEntry is defined in schema.ts and re-exported from index.ts
