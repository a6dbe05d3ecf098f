/**
 * Feature Extractor Module
 *
 * Strip emoji and URLs out of message text, then derive linguistic features
 * from what is left. Emoji come out first, then URLs, then control
 * characters; every detector sees the fully cleaned text.
 */

import { sanitizeText } from '../normalizer/sanitize'
import type { ExtractedContent, MessageFeatures } from '../types'
import { extractEmojis } from './emoji'
import {
  containsDate,
  containsMoney,
  containsPlace,
  countCharacters,
  countTokens,
  extractMentions,
  isExclamation,
  isQuestion
} from './features'
import { DEFAULT_PATTERN_TABLES, type PatternTables } from './patterns'
import { extractUrls } from './urls'

export { type Extraction, extractEmojis } from './emoji'
export {
  containsDate,
  containsMoney,
  containsPlace,
  countCharacters,
  countTokens,
  extractMentions,
  isExclamation,
  isQuestion
} from './features'
export {
  DATE_PATTERNS,
  DEFAULT_PATTERN_TABLES,
  type FeaturePattern,
  MONEY_PATTERNS,
  matchesAny,
  matchingPatternNames,
  PLACE_PATTERNS,
  type PatternTables
} from './patterns'
export { extractUrls } from './urls'

export interface ExtractorOptions {
  /** Replace any of the default pattern tables */
  readonly patterns?: Partial<PatternTables> | undefined
}

export interface ExtractionResult {
  readonly cleanedText: string
  readonly extracted: ExtractedContent
  readonly features: MessageFeatures
}

/**
 * Resolve pattern tables, falling back to the defaults per table.
 */
function resolvePatternTables(options?: ExtractorOptions): PatternTables {
  return {
    date: options?.patterns?.date ?? DEFAULT_PATTERN_TABLES.date,
    place: options?.patterns?.place ?? DEFAULT_PATTERN_TABLES.place,
    money: options?.patterns?.money ?? DEFAULT_PATTERN_TABLES.money
  }
}

/**
 * Compute the feature set of already cleaned text.
 */
export function computeFeatures(
  text: string,
  extracted: ExtractedContent,
  options?: ExtractorOptions
): MessageFeatures {
  const tables = resolvePatternTables(options)

  return {
    token_count: countTokens(text),
    character_count: countCharacters(text),
    is_question: isQuestion(text),
    is_exclamation: isExclamation(text),
    contains_date: containsDate(text, tables),
    contains_place: containsPlace(text, tables),
    contains_money: containsMoney(text, tables),
    mentions: extractMentions(text),
    has_emojis: extracted.emojis.length > 0,
    has_urls: extracted.urls.length > 0,
    emoji_count: extracted.emojis.length,
    url_count: extracted.urls.length
  }
}

/**
 * Extract emoji and URLs from raw message text and compute its features.
 */
export function extractFeatures(text: string, options?: ExtractorOptions): ExtractionResult {
  const withoutEmojis = extractEmojis(text)
  const withoutUrls = extractUrls(withoutEmojis.text)
  const cleanedText = sanitizeText(withoutUrls.text)

  const extracted: ExtractedContent = {
    emojis: withoutEmojis.matches,
    urls: withoutUrls.matches
  }

  return { cleanedText, extracted, features: computeFeatures(cleanedText, extracted, options) }
}
