export type PlainObject = Record<string, unknown>

/**
 * Check for a non-null, non-array object.
 */
export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced, not merged.
 * Undefined values in source are ignored.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue
    }

    const targetValue = result[key]
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue
  }

  return result
}

/**
 * Set a value at a dot-separated path in an object.
 * Creates intermediate objects as needed.
 */
export function setPath(obj: PlainObject, path: string, value: unknown): void {
  const parts = path.split('.')
  let current = obj

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i]
    const next = current[part]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: PlainObject = {}
      current[part] = created
      current = created
    }
  }

  current[parts[parts.length - 1]] = value
}

/**
 * Get a value at a dot-separated path in an object.
 */
export function getPath(obj: PlainObject, path: string): unknown {
  let current: unknown = obj

  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined
    }
    current = current[part]
  }

  return current
}
