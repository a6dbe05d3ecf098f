/**
 * Segment Command
 *
 * Normalized JSONL → segmented JSONL.
 */

import { toJsonl } from '../../parser/index'
import { readNormalizedRecords } from '../../validator/index'
import type { CLIArgs } from '../args'
import { outputPathFor, readInputFile, writeOutputFile } from '../io'
import type { Logger } from '../logger'
import { logErrorTally, logRecordErrors, runSegmentStage } from '../pipeline'
import type { Settings } from '../settings'

export async function cmdSegment(args: CLIArgs, settings: Settings, logger: Logger): Promise<void> {
  const content = await readInputFile(args.input)
  const { records, errors } = readNormalizedRecords(content)
  logRecordErrors('Skipped invalid line', errors, logger)
  logger.success(`Loaded ${records.length.toLocaleString()} normalized records`)

  const segments = runSegmentStage(records, settings, logger)

  const outputPath = args.output ?? outputPathFor(args.input, 'segmented', settings.outputDir)
  await writeOutputFile(outputPath, toJsonl(segments))
  logger.success(`Saved segments to ${outputPath}`)

  logErrorTally(errors.length, logger)
}
