import { mkdir, appendFile, readFile, readdir } from 'fs/promises'
import path from 'path'
import type { AuditEntry } from '../schema.js'
import { AuditEntrySchema } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import { matchesFilter, type AuditStore, type AuditFilter } from './interface.js'

const FILE_PATTERN = /^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/

/**
 * JSONL-based audit store with daily file rotation.
 *
 * File naming: audit-YYYY-MM-DD.jsonl (local date)
 * Location: DOCSIFT_HOME/logs/audit/ unless configured otherwise
 */
export class JsonlAuditStore implements AuditStore {
  private readonly baseDir: string
  private initialized = false

  constructor(baseDir: string) {
    this.baseDir = baseDir
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return
    await mkdir(this.baseDir, { recursive: true })
    this.initialized = true
  }

  /**
   * Get the filename for a given date.
   */
  getFilename(date: Date): string {
    const yyyy = date.getFullYear()
    const mm = String(date.getMonth() + 1).padStart(2, '0')
    const dd = String(date.getDate()).padStart(2, '0')
    return `audit-${yyyy}-${mm}-${dd}.jsonl`
  }

  /**
   * Append an audit entry to the store.
   * The entry is sanitized before writing.
   */
  async append(entry: AuditEntry): Promise<void> {
    await this.ensureDir()

    // Sanitize before writing - this is the choke point
    const sanitized = sanitizeAuditEntry(entry)

    const filePath = path.join(this.baseDir, this.getFilename(sanitized.timestamp))
    await appendFile(filePath, JSON.stringify(sanitized) + '\n', 'utf-8')
  }

  /**
   * Query audit entries matching the filter.
   * Files are read newest day first; entries within a day in write order.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    await this.ensureDir()

    const results: AuditEntry[] = []
    const files = await this.getRelevantFiles(filter)

    for (const file of files) {
      const entries = await this.readEntries(file)
      for (const entry of entries) {
        if (!matchesFilter(entry, filter)) continue
        results.push(entry)
        if (filter.limit && results.length >= filter.limit) {
          return results
        }
      }
    }

    return results
  }

  /**
   * Files that may hold entries in the filter's date range, newest first.
   */
  private async getRelevantFiles(filter: AuditFilter): Promise<string[]> {
    const files = await readdir(this.baseDir)

    return files
      .filter((f) => FILE_PATTERN.test(f))
      .sort()
      .reverse()
      .filter((f) => {
        const match = FILE_PATTERN.exec(f)
        if (!match) return false
        const dayStart = new Date(`${match[1]}T00:00:00`)
        const nextDay = new Date(dayStart)
        nextDay.setDate(nextDay.getDate() + 1)

        if (filter.since && nextDay <= filter.since) return false
        if (filter.until && dayStart > filter.until) return false
        return true
      })
  }

  /**
   * Read and parse entries from a file. Malformed lines are skipped.
   */
  private async readEntries(filename: string): Promise<AuditEntry[]> {
    const content = await readFile(path.join(this.baseDir, filename), 'utf-8')
    const entries: AuditEntry[] = []

    for (const line of content.split('\n')) {
      if (!line.trim()) continue

      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        continue
      }

      const result = AuditEntrySchema.safeParse(parsed)
      if (result.success) {
        entries.push(result.data)
      }
    }

    return entries
  }
}
