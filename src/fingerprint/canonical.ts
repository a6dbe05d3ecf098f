/**
 * Canonical JSON
 *
 * Deterministic serialization for hashing: object keys sorted recursively,
 * no whitespace, and every non-ASCII code unit escaped as `\uXXXX` so the
 * bytes hashed do not depend on the output encoding.
 */

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }

  const entries: Array<[string, unknown]> = Object.entries(value)
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

  const sorted: Record<string, unknown> = {}
  for (const [key, entry] of entries) {
    sorted[key] = sortKeys(entry)
  }
  return sorted
}

function escapeNonAscii(json: string): string {
  return json.replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  )
}

export function canonicalJson(value: unknown): string {
  return escapeNonAscii(JSON.stringify(sortKeys(value)) ?? 'null')
}
