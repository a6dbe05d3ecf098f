/**
 * CLI Logger
 *
 * Status lines go to stdout, warnings and errors to stderr. `--quiet` silences
 * everything except warnings and errors; `--verbose` adds debug lines.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  progress: (msg: string, current: number, total: number) => void
}

/** The part of a writable stream the logger needs. */
export interface LogSink {
  write(chunk: string): unknown
}

export interface LoggerStreams {
  stdout?: LogSink
  stderr?: LogSink
}

const PROGRESS_WIDTH = 40

/**
 * Render `[████░░░░] 50%` for a completed/total pair. Totals of zero render as 0%.
 */
export function renderProgressBar(current: number, total: number, width = PROGRESS_WIDTH): string {
  const ratio = total > 0 ? Math.min(Math.max(current / total, 0), 1) : 0
  const filled = Math.round(ratio * width)
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${Math.round(ratio * 100)}%`
}

export function createLogger(quiet: boolean, verbose: boolean, streams: LoggerStreams = {}): Logger {
  const stdout = streams.stdout ?? process.stdout
  const stderr = streams.stderr ?? process.stderr
  const out = (line: string): void => {
    if (!quiet) stdout.write(`${line}\n`)
  }

  return {
    log: out,
    verbose: (msg) => {
      if (verbose) out(`  [debug] ${msg}`)
    },
    success: (msg) => out(`  ✓ ${msg}`),
    warn: (msg) => {
      stderr.write(`  ⚠️  ${msg}\n`)
    },
    error: (msg) => {
      stderr.write(`  ✗ ${msg}\n`)
    },
    progress: (msg, current, total) => {
      if (quiet || total <= 0) return
      stdout.write(`\r  ${renderProgressBar(current, total)} ${msg}`)
      if (current >= total) stdout.write('\n')
    }
  }
}
