import { describe, expect, it } from 'vitest'
import { extractFeatures } from './index'

describe('extractFeatures', () => {
  it('extracts emoji, then URLs, then sanitizes', () => {
    const result = extractFeatures('  Lunch @alex? 🍕 https://menu.example.com/today  ')
    expect(result.cleanedText).toBe('Lunch @alex?')
    expect(result.extracted).toEqual({
      emojis: ['🍕'],
      urls: ['https://menu.example.com/today']
    })
    expect(result.features.is_question).toBe(true)
    expect(result.features.mentions).toEqual(['alex'])
    expect(result.features.token_count).toBe(2)
  })

  it('yields empty features for empty text', () => {
    expect(extractFeatures('')).toEqual({
      cleanedText: '',
      extracted: { emojis: [], urls: [] },
      features: {
        token_count: 0,
        character_count: 0,
        is_question: false,
        is_exclamation: false,
        contains_date: false,
        contains_place: false,
        contains_money: false,
        mentions: [],
        has_emojis: false,
        has_urls: false,
        emoji_count: 0,
        url_count: 0
      }
    })
  })

  it('uses pattern tables passed through options', () => {
    const text = 'see you at noon'
    expect(extractFeatures(text).features.contains_date).toBe(false)

    const noon = { name: 'noon', pattern: /\bnoon\b/i, description: 'Noon' }
    const result = extractFeatures(text, { patterns: { date: [noon] } })
    expect(result.features.contains_date).toBe(true)
    // Tables not overridden keep their defaults
    expect(result.features.contains_place).toBe(true)
  })

  it('returns text without emoji or URLs unchanged apart from stripped control characters', () => {
    const result = extractFeatures('Hi\u0007 there\u200b\nnext\tline')
    expect(result.cleanedText).toBe('Hi there\nnext\tline')
    expect(result.extracted).toEqual({ emojis: [], urls: [] })
    expect(result.features.token_count).toBe(4)
    expect(result.features.character_count).toBe(18)
  })

  describe('cleaned text plus extracted parts', () => {
    const nonWhitespace = (parts: readonly string[]): string =>
      [...parts.join('').replace(/\s/gu, '')].sort().join('')

    const inputs = [
      '\u{1F44D} ok \u{1F44D}\u{1F3FD}',
      '\u{1F468} hi \u{1F468}\u200d\u{1F469}\u200d\u{1F467}',
      'menu https://menu.example.com/today?x=1 \u{1F355}\u{1F355} tonight!',
      '\u{1F1EF}\u{1F1F5} trip, see http://example.org:8080/a#b and @sam',
      'no extras here'
    ]

    it.each(inputs)('keeps every non-whitespace character of %j', (input) => {
      const { cleanedText, extracted } = extractFeatures(input)
      expect(nonWhitespace([cleanedText, ...extracted.emojis, ...extracted.urls])).toBe(
        nonWhitespace([input])
      )
    })
  })
})
