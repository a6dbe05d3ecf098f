import { describe, expect, it } from 'vitest'
import { sanitizeText } from './sanitize'

describe('sanitizeText', () => {
  it('strips control and format characters', () => {
    expect(sanitizeText('a\u0007b\u200bc\u00ad')).toBe('abc')
  })

  it('keeps newline, tab and carriage return inside the text', () => {
    expect(sanitizeText('line one\r\n\tline two')).toBe('line one\r\n\tline two')
  })

  it('removes non-ASCII spaces and line separators', () => {
    expect(sanitizeText('a\u00a0b\u2028c')).toBe('abc')
  })

  it('trims surrounding whitespace', () => {
    expect(sanitizeText('  \n hello \t ')).toBe('hello')
  })

  it('returns an empty string for empty input', () => {
    expect(sanitizeText('')).toBe('')
  })
})
