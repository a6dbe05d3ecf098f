/**
 * chat-segments Core Library
 *
 * Normalize exported chat messages, extract features, fingerprint them, and
 * group them into conversation segments.
 *
 * Normalization, extraction, fingerprinting and segmentation are pure functions.
 * I/O is limited to the summarizer's model requests and `FilesystemCache`,
 * which reads and writes cached responses on disk. Progress reporting and file
 * orchestration live in the CLI.
 *
 * @license AGPL-3.0
 */

// Cache module
export type { CachedResponse, CacheKeyComponents, ResponseCache } from './caching/index'
export { FilesystemCache, generateCacheKey, generateSummaryCacheKey } from './caching/index'
// Errors
export { ConfigError, InputFileError, NormalizationError } from './errors'
// Extractor module
export {
  computeFeatures,
  DATE_PATTERNS,
  DEFAULT_PATTERN_TABLES,
  type ExtractionResult,
  type ExtractorOptions,
  extractEmojis,
  extractFeatures,
  extractUrls,
  type FeaturePattern,
  MONEY_PATTERNS,
  matchesAny,
  PLACE_PATTERNS,
  type PatternTables
} from './extractor/index'
// Fingerprint module
export {
  canonicalJson,
  type DeduplicationResult,
  dedupeRecords,
  fingerprintRecord,
  verifyFingerprint
} from './fingerprint/index'
// HTTP utilities
export { type FetchFn, type HttpResponse, httpFetch } from './http'
// Normalizer module
export {
  DEFAULT_SCHEMA_VERSION,
  DEFAULT_SOURCE_DEVICE_ID,
  deriveRecordId,
  type NormalizerOptions,
  normalizeBatch,
  normalizeRecord,
  normalizeSender,
  parseTimestamp,
  readRawRecord,
  sanitizeText,
  senderIdentity
} from './normalizer/index'
// Input reader
export { parseJsonl, parseRawRecords, splitJsonObjects, toJsonl } from './parser/index'
// Segmenter module
export {
  computeSegmentStats,
  DEFAULT_WINDOW_HOURS,
  flattenSegments,
  formatSegmentId,
  Segmenter,
  segmentMessages
} from './segmenter/index'
// Summarizer module
export {
  type CacheErrorInfo,
  createSummarizer,
  formatTimeframe,
  type ModelSummarizerConfig,
  OpenAISummarizer,
  type Summarizer,
  summarizeSegments,
  TemplateSummarizer
} from './summarizer/index'
// Types
export type {
  ApiError,
  ApiErrorType,
  Attachment,
  BatchResult,
  ExtractedContent,
  JsonValue,
  MessageFeatures,
  NormalizedRecord,
  NormalizeOptions,
  RawRecord,
  RecordError,
  Result,
  Segment,
  SegmenterOptions,
  SegmentStats,
  SegmentSummary,
  Sender,
  SenderKind
} from './types'
// Validator module
export {
  isNormalizedRecord,
  isSegment,
  readNormalizedRecords,
  readSegments,
  type ValidationReport,
  validateJsonl,
  validateNormalizedRecord
} from './validator/index'
// Worker pool
export { runWorkerPool } from './worker-pool'

export const VERSION = '0.1.0'
