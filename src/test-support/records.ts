/**
 * Record builders for tests.
 */

import { normalizeRecord } from '../normalizer/index'
import { segmentMessages } from '../segmenter/index'
import type { NormalizedRecord, RawRecord, Segment } from '../types'

let counter = 0

/**
 * Normalize a raw record, filling in a unique guid when none is given.
 */
export function makeRecord(raw: RawRecord = {}): NormalizedRecord {
  counter++
  return normalizeRecord({
    guid: `test-guid-${counter.toString().padStart(6, '0')}`,
    sender: 'Me',
    contents: `message ${counter}`,
    ...raw
  })
}

/**
 * One record per `[timestamp, sender]` pair, in the given order.
 */
export function makeConversation(
  messages: ReadonlyArray<readonly [timestamp: string, sender: string]>
): NormalizedRecord[] {
  return messages.map(([timestamp, sender]) => makeRecord({ timestamp, sender }))
}

/**
 * The single segment produced from a conversation.
 */
export function makeSegment(
  messages: ReadonlyArray<readonly [timestamp: string, sender: string]>
): Segment {
  const [segment] = segmentMessages(makeConversation(messages))
  if (!segment) throw new Error('Conversation produced no segment')
  return segment
}
