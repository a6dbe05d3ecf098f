/**
 * Feature Detectors
 *
 * Pure functions of the cleaned message text. Empty text yields the empty
 * default for every feature.
 */

import { DEFAULT_PATTERN_TABLES, matchesAny, type PatternTables } from './patterns'

const QUESTION_WORDS = ['what', 'when', 'where', 'who', 'why', 'how', 'which', 'whose', 'whom']

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu
const MENTION_PATTERN = /@([\p{L}\p{N}_]+)/gu

/**
 * Count maximal runs of letters, digits and underscores.
 */
export function countTokens(text: string): number {
  if (!text) return 0
  return text.match(TOKEN_PATTERN)?.length ?? 0
}

/**
 * Length in code points, so an astral character counts once.
 */
export function countCharacters(text: string): number {
  return Array.from(text).length
}

export function isQuestion(text: string): boolean {
  if (!text) return false
  if (text.includes('?')) return true

  const lower = text.toLowerCase().trim()
  return QUESTION_WORDS.some((word) => lower.startsWith(`${word} `))
}

export function isExclamation(text: string): boolean {
  return text.includes('!')
}

/**
 * Handles after each `@`, without the `@`, duplicates preserved.
 */
export function extractMentions(text: string): string[] {
  if (!text) return []
  return Array.from(text.matchAll(MENTION_PATTERN), (match) => match[1] ?? '')
}

export function containsDate(text: string, tables: PatternTables = DEFAULT_PATTERN_TABLES): boolean {
  return Boolean(text) && matchesAny(tables.date, text)
}

export function containsPlace(
  text: string,
  tables: PatternTables = DEFAULT_PATTERN_TABLES
): boolean {
  return Boolean(text) && matchesAny(tables.place, text)
}

export function containsMoney(
  text: string,
  tables: PatternTables = DEFAULT_PATTERN_TABLES
): boolean {
  return Boolean(text) && matchesAny(tables.money, text)
}
