/**
 * JSON Object Stream Splitter
 *
 * Splits a character stream of JSON objects into individual object texts.
 * Handles both JSONL and objects concatenated without separators (`}{`).
 *
 * Depth counting is string-aware: braces inside JSON strings, and escaped
 * quotes inside those strings, do not affect depth.
 */

export interface ObjectChunk {
  /** Position of the object in the stream (0-based) */
  readonly index: number
  /** Raw text of the object, from `{` to the matching `}` */
  readonly text: string
}

export interface SplitResult {
  readonly chunks: readonly ObjectChunk[]
  /** Text of a trailing object that was never closed, if any */
  readonly unterminated: string | null
}

/**
 * Split concatenated or line-delimited JSON objects.
 *
 * Characters outside any object (newlines, commas, stray closing braces)
 * are ignored.
 */
export function splitJsonObjects(content: string): SplitResult {
  const chunks: ObjectChunk[] = []
  let depth = 0
  let start = -1
  let inString = false
  let escaped = false

  for (let i = 0; i < content.length; i++) {
    const char = content[i]

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (char === '\\') {
        escaped = true
      } else if (char === '"') {
        inString = false
      }
      continue
    }

    if (char === '"') {
      if (depth > 0) inString = true
    } else if (char === '{') {
      if (depth === 0) start = i
      depth++
    } else if (char === '}' && depth > 0) {
      depth--
      if (depth === 0) {
        chunks.push({ index: chunks.length, text: content.slice(start, i + 1) })
        start = -1
      }
    }
  }

  return { chunks, unterminated: depth > 0 && start >= 0 ? content.slice(start) : null }
}
