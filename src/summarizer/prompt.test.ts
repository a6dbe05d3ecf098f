import { describe, expect, it } from 'vitest'
import { segmentMessages } from '../segmenter/index'
import { makeRecord } from '../test-support/records'
import { buildSummaryPrompt } from './prompt'

describe('buildSummaryPrompt', () => {
  it('labels messages by speaker and includes segment metadata', () => {
    const [segment] = segmentMessages([
      makeRecord({ timestamp: '2025-02-27T18:20:00Z', sender: 'Me', contents: 'Dinner?' }),
      makeRecord({ timestamp: '2025-02-27T18:21:00Z', sender: '+15551234567', contents: 'Sure' }),
      makeRecord({
        timestamp: '2025-02-27T18:22:00Z',
        sender: 'Unknown',
        is_from_me: true,
        contents: 'Great'
      })
    ])
    if (!segment) throw new Error('expected a segment')

    const prompt = buildSummaryPrompt(segment)
    expect(prompt).toContain('Date: 2025-02-27\nTimeframe: 06:20 PM - 06:22 PM\n')
    expect(prompt).toContain('Participants: me, +15551234567, Unknown\nMessage Count: 3\n')
    expect(prompt).toContain(
      'Conversation Content:\n- Me: Dinner?\n- Other person: Sure\n- Me: Great\n'
    )
  })
})
