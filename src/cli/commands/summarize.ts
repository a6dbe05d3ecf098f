/**
 * Summarize Command
 *
 * Segmented JSONL → summaries JSONL. Uses the model when OPENAI_API_KEY is
 * set and falls back to templated summaries otherwise.
 */

import { FilesystemCache } from '../../caching/index'
import { toJsonl } from '../../parser/index'
import { createSummarizer, summarizeSegments } from '../../summarizer/index'
import { readSegments } from '../../validator/index'
import type { CLIArgs } from '../args'
import { outputPathFor, readInputFile, writeOutputFile } from '../io'
import type { Logger } from '../logger'
import { logErrorTally, logRecordErrors } from '../pipeline'
import type { Settings } from '../settings'

export async function cmdSummarize(args: CLIArgs, settings: Settings, logger: Logger): Promise<void> {
  const content = await readInputFile(args.input)
  const { records: segments, errors } = readSegments(content)
  logRecordErrors('Skipped invalid line', errors, logger)

  const summarizer = createSummarizer({
    apiKey: settings.apiKey,
    model: settings.model,
    cache: settings.noCache ? undefined : new FilesystemCache(settings.cacheDir),
    onRetry: ({ segmentId, attempt, delayMs }) =>
      logger.verbose(`${segmentId}: rate limited (attempt ${attempt}), retrying in ${delayMs}ms`),
    onFallback: ({ segmentId, error }) =>
      logger.warn(`${segmentId}: ${error.message}, using template summary`),
    onCacheError: ({ segmentId, operation, message }) =>
      logger.warn(`${segmentId}: cache ${operation} failed (${message})`)
  })
  if (summarizer.name === 'template') {
    logger.log('OPENAI_API_KEY not set, using template summaries')
  } else {
    logger.verbose(`Summarizing with ${settings.model}`)
  }

  const total =
    settings.maxSegments > 0 ? Math.min(settings.maxSegments, segments.length) : segments.length
  const result = await summarizeSegments(segments, summarizer, {
    maxSegments: settings.maxSegments,
    concurrency: settings.summaryConcurrency,
    onProgress: ({ completed }) => logger.progress('summarized', completed, total)
  })
  for (const { segmentId, message } of result.errors) {
    logger.error(`${segmentId}: ${message}`)
  }

  for (const summary of result.summaries) {
    logger.verbose(`${summary.segment_id} ${summary.date} ${summary.timeframe}: ${summary.summary}`)
  }

  const outputPath = args.output ?? outputPathFor(args.input, 'summaries', settings.outputDir)
  await writeOutputFile(outputPath, toJsonl(result.summaries))
  logger.success(`Saved ${result.summaries.length} summaries to ${outputPath}`)

  logErrorTally(errors.length + result.errors.length, logger)
}
