import type { AuditEntry } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import { matchesFilter, type AuditFilter, type AuditStore } from './interface.js'

/**
 * In-process audit store holding the most recent entries.
 * Used when the on-disk trail is disabled, and in tests.
 */
export class MemoryAuditStore implements AuditStore {
  private readonly entries: AuditEntry[] = []

  constructor(private readonly maxEntries = 1000) {}

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(sanitizeAuditEntry(entry))
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries)
    }
  }

  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const results: AuditEntry[] = []
    for (const entry of this.entries) {
      if (!matchesFilter(entry, filter)) continue
      results.push(entry)
      if (filter.limit && results.length >= filter.limit) break
    }
    return results
  }

  /**
   * All entries in write order.
   */
  all(): readonly AuditEntry[] {
    return this.entries
  }

  clear(): void {
    this.entries.length = 0
  }
}
