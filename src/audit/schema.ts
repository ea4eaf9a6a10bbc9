import { z } from 'zod'
import { AUDIT_CATEGORIES, AUDIT_SEVERITIES } from './types.js'

/**
 * Audit entry schema.
 *
 * Timestamps use z.coerce.date(): a Date becomes an ISO string in JSONL
 * and is read back as a Date.
 */
export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  category: z.enum(AUDIT_CATEGORIES),
  action: z.string(),
  severity: z.enum(AUDIT_SEVERITIES),
  requestId: z.string().optional(),
  documentId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
})

/**
 * Audit entry type. Defined here only; types.ts holds the enums.
 */
export type AuditEntry = z.infer<typeof AuditEntrySchema>
