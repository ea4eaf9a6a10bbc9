import { randomUUID } from 'crypto'
import type { AuditEntry } from './schema.js'
import { meetsSeverity, type AuditCategory, type AuditSeverity } from './types.js'
import type { AuditFilter, AuditStore } from './store/interface.js'
import { JsonlAuditStore } from './store/jsonl.js'
import { getAuditPath } from '../config/paths.js'

type EntryMetadata = Record<string, unknown>

/**
 * One event to record. `documentId` ties the entry to a classify() run.
 */
export interface AuditOptions {
  category: AuditCategory
  action: string
  severity?: AuditSeverity
  requestId?: string
  documentId?: string
  metadata?: EntryMetadata
}

export interface AuditLoggerOptions {
  /** Entries below this severity are dropped (default: debug) */
  minSeverity?: AuditSeverity
  /**
   * Called when the store rejects a write. The default reports a process
   * warning; a failed audit write never fails the caller.
   */
  onError?: (error: unknown, entry: AuditEntry) => void
}

function reportWriteError(error: unknown, entry: AuditEntry): void {
  const reason = error instanceof Error ? error.message : String(error)
  process.emitWarning(
    `Audit write failed for ${entry.category}/${entry.action}: ${reason}`,
    'AuditWarning'
  )
}

/**
 * Writes audit entries for the classification pipeline.
 *
 * Entries under the minimum severity are dropped here; sanitisation
 * happens in the store, at the point of writing.
 */
export class AuditLogger {
  private readonly store: AuditStore
  private readonly minSeverity: AuditSeverity
  private readonly onError: (error: unknown, entry: AuditEntry) => void

  constructor(store?: AuditStore, options: AuditLoggerOptions = {}) {
    this.store = store ?? new JsonlAuditStore(getAuditPath())
    this.minSeverity = options.minSeverity ?? 'debug'
    this.onError = options.onError ?? reportWriteError
  }

  async log(options: AuditOptions): Promise<void> {
    const severity = options.severity ?? 'info'
    if (!meetsSeverity(severity, this.minSeverity)) return

    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      category: options.category,
      action: options.action,
      severity,
      requestId: options.requestId,
      documentId: options.documentId,
      metadata: options.metadata,
    }

    try {
      await this.store.append(entry)
    } catch (error) {
      this.onError(error, entry)
    }
  }

  debug(category: AuditCategory, action: string, metadata?: EntryMetadata, documentId?: string) {
    return this.log({ category, action, severity: 'debug', metadata, documentId })
  }

  info(category: AuditCategory, action: string, metadata?: EntryMetadata, documentId?: string) {
    return this.log({ category, action, severity: 'info', metadata, documentId })
  }

  warning(category: AuditCategory, action: string, metadata?: EntryMetadata, documentId?: string) {
    return this.log({ category, action, severity: 'warning', metadata, documentId })
  }

  alert(category: AuditCategory, action: string, metadata?: EntryMetadata, documentId?: string) {
    return this.log({ category, action, severity: 'alert', metadata, documentId })
  }

  /** Reserved for configuration that leaves the pipeline unusable */
  critical(category: AuditCategory, action: string, metadata?: EntryMetadata, documentId?: string) {
    return this.log({ category, action, severity: 'critical', metadata, documentId })
  }

  /** Entries matching the filter, in the store's order */
  query(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.store.query(filter)
  }
}
