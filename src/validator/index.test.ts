import { describe, expect, it } from 'vitest'
import { toJsonl } from '../parser/index'
import { makeRecord, makeSegment } from '../test-support/records'
import {
  findRecordProblems,
  isNormalizedRecord,
  isSegment,
  readNormalizedRecords,
  readSegments,
  validateJsonl,
  validateNormalizedRecord
} from './index'

/** A normalized record as it reads back from JSONL */
function recordObject(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const parsed: unknown = JSON.parse(JSON.stringify(makeRecord({ timestamp: '2025-02-27T10:00:00Z' })))
  if (typeof parsed !== 'object' || parsed === null) throw new Error('expected an object')
  return { ...parsed, ...overrides }
}

function without(record: Record<string, unknown>, field: string): Record<string, unknown> {
  const { [field]: _removed, ...rest } = record
  return rest
}

describe('Validator', () => {
  describe('findRecordProblems', () => {
    it('accepts a normalized record', () => {
      expect(findRecordProblems(recordObject())).toEqual([])
      expect(isNormalizedRecord(recordObject())).toBe(true)
    })

    it('accepts a null timestamp', () => {
      expect(findRecordProblems(recordObject({ timestamp: null }))).toEqual([])
    })

    it('flags missing fields', () => {
      expect(findRecordProblems(without(recordObject(), 'source_device_id'))).toEqual([
        "Missing required field 'source_device_id'"
      ])
    })

    it('flags timestamps not in canonical UTC form', () => {
      expect(findRecordProblems(recordObject({ timestamp: '2025-02-27 10:00' }))).toEqual([
        'Invalid timestamp format: 2025-02-27 10:00'
      ])
    })

    it('flags sender problems', () => {
      expect(findRecordProblems(recordObject({ sender: { me: true, other: 'x' } }))).toEqual([
        'Multiple sender fields: me, other'
      ])
      expect(findRecordProblems(recordObject({ sender: {} }))).toEqual([
        'Missing sender normalization'
      ])
      expect(findRecordProblems(recordObject({ sender: { phone: 5 } }))).toEqual([
        "Invalid sender value for 'phone'"
      ])
    })

    it('flags short ids and malformed fingerprints', () => {
      expect(findRecordProblems(recordObject({ id: 'short' }))).toEqual([
        'Invalid ID format: short'
      ])
      expect(findRecordProblems(recordObject({ fingerprint: 'ABC' }))).toEqual([
        'Invalid fingerprint format: ABC'
      ])
    })

    it('prefixes problems with the line number', () => {
      expect(validateNormalizedRecord(recordObject({ id: 'short' }), 7)).toEqual([
        'Line 7: Invalid ID format: short'
      ])
    })

    it('rejects records with malformed features', () => {
      expect(isNormalizedRecord(recordObject({ features: { token_count: '3' } }))).toBe(false)
    })
  })

  describe('validateJsonl', () => {
    it('reports totals, errors and tallies', () => {
      const content = [
        JSON.stringify(recordObject()),
        JSON.stringify(recordObject({ sender: { phone: '+15551234567' } })),
        JSON.stringify(without(recordObject(), 'fingerprint')),
        'not json',
        JSON.stringify(recordObject({ sender: { me: true, other: 'x' } })),
        ''
      ].join('\n')

      const report = validateJsonl(content)

      expect(report.totalRecords).toBe(5)
      expect(report.validRecords).toBe(2)
      expect(report.errors).toHaveLength(3)
      expect(report.errors[0]).toBe("Line 3: Missing required field 'fingerprint'")
      expect(report.errors[1]).toMatch(/^Line 4: Invalid JSON: /)
      expect(report.errors[2]).toBe('Line 5: Multiple sender fields: me, other')
      expect(report.schemaVersions).toEqual({ '1.0': 4 })
      expect(report.senderTypes).toEqual({ me: 3, phone: 1, other: 0 })
    })
  })

  describe('readNormalizedRecords', () => {
    it('returns valid records and reports the rest by line', () => {
      const valid = makeRecord({ timestamp: '2025-02-27T10:00:00Z' })
      const content = `${toJsonl([valid])}${JSON.stringify(without(recordObject(), 'features'))}\n`

      const { records, errors } = readNormalizedRecords(content)

      expect(records).toEqual([valid])
      expect(errors).toEqual([{ index: 2, message: 'features must be an object' }])
    })
  })

  describe('segments', () => {
    it('reads segments back from JSONL', () => {
      const segment = makeSegment([
        ['2025-02-27T10:00:00Z', 'Me'],
        ['2025-02-27T10:05:00Z', 'Alex']
      ])
      const content = `${toJsonl([segment])}{"segment_id":"segment_0002"}\n`

      const { records: segments, errors } = readSegments(content)

      expect(segments).toEqual([segment])
      expect(errors).toEqual([{ index: 2, message: 'Invalid segment segment_0002' }])
    })

    it('rejects segments with invalid messages', () => {
      const segment = makeSegment([['2025-02-27T10:00:00Z', 'Me']])
      expect(isSegment(segment)).toBe(true)
      expect(isSegment({ ...segment, messages: [{ id: 'x' }] })).toBe(false)
    })
  })
})
