/**
 * Summary Prompt
 */

import type { NormalizedRecord, Segment } from '../types'
import { formatTimeframe } from './timeframe'

/** Bump when the prompt text changes, so cached summaries are not reused */
export const PROMPT_VERSION = 'v1'

function speaker(record: NormalizedRecord): string {
  return 'me' in record.sender || record.is_from_me === true ? 'Me' : 'Other person'
}

export function buildSummaryPrompt(segment: Segment): string {
  const lines = segment.messages.map((m) => `- ${speaker(m)}: ${m.contents}`)

  return `You summarize conversation segments, focusing on the dynamic between "Me" and the other person. If a name is evident from the conversation, use it.

Date: ${segment.date}
Timeframe: ${formatTimeframe(segment)}
Participants: ${segment.participants.join(', ')}
Message Count: ${segment.message_count}

Conversation Content:
${lines.join('\n')}

In at most three sentences, summarize:
1. The main topic or purpose of this conversation
2. The key points or developments discussed
3. The outcome or conclusion of the conversation

Summary:`
}
