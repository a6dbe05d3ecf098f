/**
 * Logger that records messages instead of printing them.
 */

import type { Logger } from '../cli/logger'

export interface RecordingLogger extends Logger {
  readonly lines: string[]
  readonly warnings: string[]
  readonly errors: string[]
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = []
  const warnings: string[] = []
  const errors: string[] = []
  return {
    lines,
    warnings,
    errors,
    log: (msg) => lines.push(msg),
    verbose: (msg) => lines.push(msg),
    success: (msg) => lines.push(msg),
    warn: (msg) => warnings.push(msg),
    error: (msg) => errors.push(msg),
    progress: () => {}
  }
}
