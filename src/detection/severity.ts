/**
 * Severity levels shared by the PII and content-safety detectors.
 */
export type Severity = 'none' | 'low' | 'medium' | 'high' | 'critical'

/**
 * Fixed ranking: critical > high > medium > low > none.
 */
export const SEVERITY_RANK: Record<Severity, number> = {
  none: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
}

/**
 * Highest severity in the list, or 'none' for an empty list.
 */
export function maxSeverity(severities: Iterable<Severity>): Severity {
  let result: Severity = 'none'
  for (const severity of severities) {
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[result]) {
      result = severity
    }
  }
  return result
}

/**
 * Clamp a score into [0, 1], rounded to four decimals so that sums
 * like 0.7 + 0.3 compare exactly.
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0
  const clamped = Math.min(1, Math.max(0, value))
  return Math.round(clamped * 10000) / 10000
}
