/**
 * URL Extraction
 */

import type { Extraction } from './emoji'

const WORD = String.raw`\p{L}\p{N}_`

/**
 * `http(s)://`, host, optional port, then optional path, query and fragment.
 * Trailing punctuation outside these classes (`,` `!` `)`) ends the match.
 */
const URL_SOURCE = String.raw`https?://[-${WORD}.]+(?::\d+)?(?:/[-${WORD}/.~%+]*)?(?:\?[-${WORD}&=%.+]*)?(?:#[-${WORD}.]*)?`

/**
 * Find every URL in the text and remove it.
 */
export function extractUrls(text: string): Extraction {
  if (!text) return { text, matches: [] }

  const matches = Array.from(text.matchAll(new RegExp(URL_SOURCE, 'gu')), (match) => match[0])
  if (matches.length === 0) return { text, matches }

  return { text: text.replace(new RegExp(URL_SOURCE, 'gu'), ''), matches }
}
