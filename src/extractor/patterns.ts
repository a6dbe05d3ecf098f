/**
 * Feature Patterns
 *
 * Pattern tables for the date, place and money detectors. Each table is an
 * ordered list of independent matchers; a feature is true when any matcher
 * in its table matches. Extend a table by passing a longer list through
 * `ExtractorOptions.patterns` rather than editing the detectors.
 */

export interface FeaturePattern {
  readonly name: string
  readonly pattern: RegExp
  readonly description: string
}

export interface PatternTables {
  readonly date: readonly FeaturePattern[]
  readonly place: readonly FeaturePattern[]
  readonly money: readonly FeaturePattern[]
}

const MONTH_ABBREVIATIONS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec'
const MONTH_NAMES =
  'January|February|March|April|May|June|July|August|September|October|November|December'

export const DATE_PATTERNS: readonly FeaturePattern[] = [
  {
    name: 'numeric_slash',
    pattern: /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/i,
    description: 'MM/DD/YYYY'
  },
  {
    name: 'numeric_dash',
    pattern: /\b\d{1,2}-\d{1,2}-\d{2,4}\b/i,
    description: 'MM-DD-YYYY'
  },
  {
    name: 'month_abbreviation',
    pattern: new RegExp(`\\b(?:${MONTH_ABBREVIATIONS})[a-z]* \\d{1,2}\\b`, 'i'),
    description: 'Mon DD'
  },
  {
    name: 'month_name',
    pattern: new RegExp(`\\b(?:${MONTH_NAMES}) \\d{1,2}\\b`, 'i'),
    description: 'Month DD'
  },
  {
    name: 'clock_time',
    // 6:30, 6:30:15 pm, 5pm, 11 am
    pattern: /\b\d{1,2}(?::\d{2}(?::\d{2})?\s*(?:am|pm)?|\s*(?:am|pm))\b/i,
    description: 'Clock time'
  },
  {
    name: 'relative_day',
    pattern:
      /\b(?:today|tomorrow|yesterday|tonight|this morning|this afternoon|this evening)\b/i,
    description: 'Relative day'
  }
]

export const PLACE_PATTERNS: readonly FeaturePattern[] = [
  {
    name: 'preposition',
    pattern: /\b(?:at|in|to|from)\s+\w+/i,
    description: 'Preposition followed by a word'
  },
  {
    name: 'venue',
    pattern: /\b(?:restaurant|cafe|bar|store|shop|mall|park|beach|airport|station)\b/i,
    description: 'Common venue'
  },
  {
    name: 'street_type',
    pattern: /\b(?:street|avenue|road|drive|lane|way|plaza|square)\b/i,
    description: 'Street type'
  },
  {
    name: 'named_street',
    pattern:
      /\b[A-Z][a-z]+(?:[-\s][A-Z][a-z]+)*\s+(?:Street|Ave|Road|Drive|Lane|Way|Plaza|Square)\b/i,
    description: 'Capitalized name followed by a street type'
  },
  {
    name: 'major_city',
    pattern:
      /\b(?:New York|Los Angeles|Chicago|Houston|Phoenix|Philadelphia|San Antonio|San Diego|Dallas|San Jose)\b/i,
    description: 'Major city'
  }
]

export const MONEY_PATTERNS: readonly FeaturePattern[] = [
  {
    name: 'dollar_amount',
    pattern: /\$\d+(?:\.\d{2})?/i,
    description: '$123.45'
  },
  {
    name: 'amount_with_currency',
    pattern: /\b\d+(?:\.\d{2})?\s*(?:dollars?|bucks?|USD)\b/i,
    description: '123.45 dollars'
  },
  {
    name: 'money_word',
    pattern: /\b(?:free|cheap|expensive|cost|price|pay|paid|spent|bought|sold)\b/i,
    description: 'Money-related word'
  }
]

export const DEFAULT_PATTERN_TABLES: PatternTables = {
  date: DATE_PATTERNS,
  place: PLACE_PATTERNS,
  money: MONEY_PATTERNS
}

/**
 * True when any pattern in the table matches.
 */
export function matchesAny(patterns: readonly FeaturePattern[], text: string): boolean {
  return patterns.some(({ pattern }) => {
    // A global or sticky pattern carries lastIndex between calls
    pattern.lastIndex = 0
    return pattern.test(text)
  })
}

/**
 * Names of every pattern in the table that matches, in table order.
 */
export function matchingPatternNames(
  patterns: readonly FeaturePattern[],
  text: string
): string[] {
  return patterns
    .filter(({ pattern }) => {
      pattern.lastIndex = 0
      return pattern.test(text)
    })
    .map(({ name }) => name)
}
