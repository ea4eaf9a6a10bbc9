/**
 * Mask a value for display: keep the first two and last two characters.
 * Values of four characters or fewer are fully masked.
 */
export function redactValue(value: string): string {
  if (value.length <= 4) {
    return '***'
  }
  return value.slice(0, 2) + '*'.repeat(value.length - 4) + value.slice(-2)
}

export interface TextSpan {
  start: number
  end: number
}

/**
 * The text between `from` and `to` with every span in it masked.
 *
 * A span cut by either edge widens the window so it is masked whole,
 * never shown in part. Spans must be sorted by start; where two overlap,
 * the part of the later one past the earlier is starred out.
 */
export function maskWindow(
  text: string,
  spans: readonly TextSpan[],
  from = 0,
  to = text.length
): string {
  let start = from
  let end = to
  let widened = true
  while (widened) {
    widened = false
    for (const span of spans) {
      if (span.end <= start || span.start >= end) continue
      if (span.start < start || span.end > end) {
        start = Math.min(start, span.start)
        end = Math.max(end, span.end)
        widened = true
      }
    }
  }

  let out = ''
  let cursor = start
  for (const span of spans) {
    if (span.end <= start || span.start >= end || span.end <= cursor) continue
    if (span.start < cursor) {
      out += '*'.repeat(span.end - cursor)
    } else {
      out += text.slice(cursor, span.start) + redactValue(text.slice(span.start, span.end))
    }
    cursor = span.end
  }
  return out + text.slice(cursor, end)
}
