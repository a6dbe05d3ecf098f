/**
 * Validate Command
 *
 * Schema check for normalized JSONL. Fails the run when any record is invalid.
 */

import { validateJsonl } from '../../validator/index'
import type { CLIArgs } from '../args'
import { readInputFile } from '../io'
import type { Logger } from '../logger'

const MAX_LISTED_ERRORS = 20

export async function cmdValidate(args: CLIArgs, logger: Logger): Promise<void> {
  const content = await readInputFile(args.input)
  const report = validateJsonl(content)

  logger.log(`\nValidating ${args.input}`)
  logger.log(`  Total records: ${report.totalRecords}`)
  logger.log(`  Valid records: ${report.validRecords}`)
  for (const [version, count] of Object.entries(report.schemaVersions)) {
    logger.log(`  Schema ${version}: ${count}`)
  }
  const { me, phone, other } = report.senderTypes
  logger.log(`  Senders: ${me} me, ${phone} phone, ${other} other`)

  if (report.errors.length === 0) {
    logger.success('All records valid')
    return
  }

  for (const error of report.errors.slice(0, MAX_LISTED_ERRORS)) {
    logger.error(error)
  }
  if (report.errors.length > MAX_LISTED_ERRORS) {
    logger.error(`...and ${report.errors.length - MAX_LISTED_ERRORS} more`)
  }
  throw new Error(`${report.totalRecords - report.validRecords} invalid records`)
}
