/**
 * Emoji Extraction
 *
 * Recognition is delegated to emoji-regex, which matches full RGI emoji
 * sequences (ZWJ families, skin tones, flags, keycaps) as single matches.
 */

import emojiRegex from 'emoji-regex'

export interface Extraction {
  /** Text with every extracted substring removed */
  readonly text: string
  /** Extracted substrings in order of appearance */
  readonly matches: readonly string[]
}

/**
 * Find every emoji in the text and remove it.
 */
export function extractEmojis(text: string): Extraction {
  if (!text) return { text, matches: [] }

  const matches = Array.from(text.matchAll(emojiRegex()), (match) => match[0])
  if (matches.length === 0) return { text, matches }

  // Removed by match position: a sequence goes whole even when its base emoji also appears alone
  return { text: text.replace(emojiRegex(), ''), matches }
}
