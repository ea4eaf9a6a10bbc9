import type { AuditEntry } from './schema.js'
import { piiDetector } from '../detection/pii/detector.js'

/**
 * Entry paths that can carry document content. Removed before writing.
 */
const NEVER_LOG_FIELDS = [
  'metadata.document.text', // Assembled document text
  'metadata.prompt', // Prompt sent to a model (embeds the document)
  'metadata.response.text', // Raw model response
]

const MAX_ERROR_MESSAGE_LENGTH = 500

/**
 * Copy of the entry that is safe to persist: content-bearing fields
 * dropped, `metadata.errorMessage` masked and truncated.
 *
 * Every store calls this on append; nothing else writes entries.
 */
export function sanitizeAuditEntry(entry: AuditEntry): AuditEntry {
  const sanitized = structuredClone(entry)

  for (const field of NEVER_LOG_FIELDS) {
    deletePath(sanitized, field)
  }

  if (sanitized.metadata?.errorMessage !== undefined) {
    sanitized.metadata.errorMessage = sanitizeErrorMessage(
      String(sanitized.metadata.errorMessage)
    )
  }

  return sanitized
}

/**
 * Mask PII in an error message and truncate it.
 */
export function sanitizeErrorMessage(msg: string): string {
  return piiDetector.redact(msg).slice(0, MAX_ERROR_MESSAGE_LENGTH)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function deletePath(obj: unknown, path: string): void {
  const parts = path.split('.')
  let current = obj

  for (let i = 0; i < parts.length - 1; i++) {
    if (!isRecord(current)) return
    current = current[parts[i]]
  }

  if (isRecord(current)) {
    delete current[parts[parts.length - 1]]
  }
}
