import { describe, expect, it } from 'vitest'
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
import { DATE_PATTERNS, matchingPatternNames } from './patterns'

describe('Feature detectors', () => {
  it('counts word-character runs as tokens', () => {
    expect(countTokens("don't stop_now 42")).toBe(4)
    expect(countTokens('...')).toBe(0)
    expect(countTokens('')).toBe(0)
  })

  it('counts characters as code points', () => {
    expect(countCharacters('😀a')).toBe(2)
    expect(countCharacters('')).toBe(0)
  })

  describe('isQuestion', () => {
    it('detects question marks', () => {
      expect(isQuestion('ok?')).toBe(true)
    })

    it('detects leading question words', () => {
      expect(isQuestion('How are you')).toBe(true)
      expect(isQuestion('  where is it')).toBe(true)
    })

    it('requires the question word to be a whole word', () => {
      expect(isQuestion('Howdy partner')).toBe(false)
      expect(isQuestion('Nowhere to go')).toBe(false)
      expect(isQuestion('')).toBe(false)
    })
  })

  it('detects exclamations', () => {
    expect(isExclamation('wow!')).toBe(true)
    expect(isExclamation('wow')).toBe(false)
  })

  it('extracts mentions in order with duplicates', () => {
    expect(extractMentions('@sam and @sam, @jo_2')).toEqual(['sam', 'sam', 'jo_2'])
    expect(extractMentions('no mentions @ all')).toEqual([])
  })

  it('detects dates and times', () => {
    expect(containsDate('see you 12/25/2024')).toBe(true)
    expect(containsDate('back tomorrow')).toBe(true)
    expect(containsDate('at 5pm')).toBe(true)
    expect(containsDate('hello there')).toBe(false)
    expect(matchingPatternNames(DATE_PATTERNS, 'Jan 5 at 6:30')).toEqual([
      'month_abbreviation',
      'clock_time'
    ])
  })

  it('detects places', () => {
    expect(containsPlace('Meet at the park')).toBe(true)
    expect(containsPlace('near Main Street')).toBe(true)
    expect(containsPlace('ok sure')).toBe(false)
  })

  it('detects money', () => {
    expect(containsMoney('it was $5')).toBe(true)
    expect(containsMoney('20 bucks')).toBe(true)
    expect(containsMoney('hello')).toBe(false)
    expect(containsMoney('')).toBe(false)
  })
})
