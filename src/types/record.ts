/**
 * Record Types
 *
 * Raw exported message records and their normalized, feature-enriched form.
 */

import type { JsonValue } from './common'

/**
 * An attachment descriptor as exported, tagged by its `mime_type` key.
 * Copied verbatim; no other key is interpreted.
 */
export type Attachment = Readonly<Record<string, unknown>>

/**
 * A message record as it appears in the export. Nothing here is trusted:
 * the input reader only guarantees that it was a JSON object.
 */
export interface RawRecord {
  readonly guid?: string | undefined
  readonly timestamp?: string | undefined
  readonly sender?: string | undefined
  readonly contents?: string | undefined
  readonly attachments?: readonly Attachment[] | undefined
  /** Passed through as exported, whatever its JSON type */
  readonly is_from_me?: JsonValue | undefined
  readonly readtime?: JsonValue | undefined
}

/**
 * Normalized sender. Exactly one tag is ever present.
 */
export type Sender =
  | { readonly me: true }
  | { readonly phone: string }
  | { readonly other: string }

export type SenderKind = 'me' | 'phone' | 'other'

export interface ExtractedContent {
  /** Emoji substrings in order of first occurrence */
  readonly emojis: readonly string[]
  /** URL substrings in order of first occurrence */
  readonly urls: readonly string[]
}

export interface MessageFeatures {
  readonly token_count: number
  readonly character_count: number
  readonly is_question: boolean
  readonly is_exclamation: boolean
  readonly contains_date: boolean
  readonly contains_place: boolean
  readonly contains_money: boolean
  /** Mentioned handles without the leading `@`, duplicates preserved */
  readonly mentions: readonly string[]
  readonly has_emojis: boolean
  readonly has_urls: boolean
  readonly emoji_count: number
  readonly url_count: number
}

/**
 * Canonical per-message record. Field order here is the field order written
 * to JSONL output.
 */
export interface NormalizedRecord {
  readonly id: string
  /** UTC instant as `YYYY-MM-DDTHH:MM:SSZ`, or null when unparseable */
  readonly timestamp: string | null
  readonly sender: Sender
  readonly is_from_me: JsonValue
  readonly readtime: JsonValue
  readonly contents: string
  readonly attachments: readonly Attachment[]
  readonly extracted: ExtractedContent
  readonly features: MessageFeatures
  readonly source_device_id: string
  readonly schema_version: string
  readonly fingerprint: string
}

/** A normalized record before its fingerprint has been computed. */
export type UnfingerprintedRecord = Omit<NormalizedRecord, 'fingerprint'>

export interface NormalizeOptions {
  /** Written to every record (default "1.0") */
  readonly schemaVersion?: string | undefined
  /** Opaque device identifier (default "unknown") */
  readonly sourceDeviceId?: string | undefined
}

/**
 * A record that could not be read or normalized, by position in the input.
 */
export interface RecordError {
  readonly index: number
  readonly message: string
}

export interface BatchResult<T> {
  readonly records: readonly T[]
  readonly errors: readonly RecordError[]
}
