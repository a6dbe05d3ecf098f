/**
 * Template Summarizer
 *
 * Deterministic summary built from segment metadata alone. Used when no API
 * key is configured and as the fallback when a model call fails.
 */

import type { Segment, SegmentSummary } from '../types'
import { formatTimeframe } from './timeframe'
import type { Summarizer } from './types'

const BRIEF_SEGMENT_MAX = 5

export function templateSummaryText(segment: Segment, timeframe: string): string {
  const size = segment.message_count <= BRIEF_SEGMENT_MAX ? 'brief' : 'substantial'
  return (
    `Conversation on ${segment.date} from ${timeframe} involving ` +
    `${segment.participants.length} participants. The exchange consisted of ` +
    `${segment.message_count} messages covering various topics. ` +
    `This appears to be a ${size} conversation segment.`
  )
}

/**
 * Build a summary record around the given text.
 */
export function buildSummary(
  segment: Segment,
  summary: string,
  generatedByModel: boolean
): SegmentSummary {
  return {
    date: segment.date,
    timeframe: formatTimeframe(segment),
    summary,
    segment_id: segment.segment_id,
    message_count: segment.message_count,
    participants: segment.participants,
    generated_by_model: generatedByModel
  }
}

export class TemplateSummarizer implements Summarizer {
  readonly name = 'template'

  async summarize(segment: Segment): Promise<SegmentSummary> {
    return buildSummary(segment, templateSummaryText(segment, formatTimeframe(segment)), false)
  }
}
