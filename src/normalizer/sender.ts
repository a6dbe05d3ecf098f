/**
 * Sender Normalization
 */

import type { Sender, SenderKind } from '../types'

/** `+` then 2-15 digits, the first 1-9 */
const E164_PATTERN = /^\+[1-9]\d{1,14}$/

/**
 * Map an exported sender string onto exactly one tag.
 * Anything unrecognised is kept verbatim under `other`.
 */
export function normalizeSender(value: string): Sender {
  if (value === 'Me') return { me: true }
  if (E164_PATTERN.test(value)) return { phone: value }
  return { other: value }
}

export function senderKind(sender: Sender): SenderKind {
  if ('me' in sender) return 'me'
  if ('phone' in sender) return 'phone'
  return 'other'
}

/**
 * Participant identity string: `me`, the phone number, or the raw string.
 */
export function senderIdentity(sender: Sender): string {
  if ('me' in sender) return 'me'
  if ('phone' in sender) return sender.phone
  return sender.other
}
