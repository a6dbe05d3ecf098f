import { describe, expect, it } from 'vitest'
import { createLogger, type LogSink, renderProgressBar } from './logger'

function sink(): LogSink & { text: () => string } {
  const chunks: string[] = []
  return {
    write: (chunk: string) => chunks.push(chunk),
    text: () => chunks.join('')
  }
}

describe('renderProgressBar', () => {
  it('fills proportionally', () => {
    expect(renderProgressBar(1, 2, 4)).toBe('[██░░] 50%')
    expect(renderProgressBar(3, 3, 4)).toBe('[████] 100%')
  })

  it('renders an empty bar for a zero total', () => {
    expect(renderProgressBar(0, 0, 4)).toBe('[░░░░] 0%')
  })

  it('clamps overshoot', () => {
    expect(renderProgressBar(5, 2, 2)).toBe('[██] 100%')
  })
})

describe('createLogger', () => {
  it('routes status lines to stdout and problems to stderr', () => {
    const stdout = sink()
    const stderr = sink()
    const logger = createLogger(false, false, { stdout, stderr })

    logger.log('hello')
    logger.success('done')
    logger.verbose('hidden')
    logger.warn('careful')
    logger.error('broken')

    expect(stdout.text()).toBe('hello\n  ✓ done\n')
    expect(stderr.text()).toBe('  ⚠️  careful\n  ✗ broken\n')
  })

  it('prints debug lines when verbose', () => {
    const stdout = sink()
    createLogger(false, true, { stdout, stderr: sink() }).verbose('detail')
    expect(stdout.text()).toBe('  [debug] detail\n')
  })

  it('keeps warnings and errors when quiet', () => {
    const stdout = sink()
    const stderr = sink()
    const logger = createLogger(true, true, { stdout, stderr })

    logger.log('hello')
    logger.verbose('detail')
    logger.progress('working', 1, 2)
    logger.warn('careful')

    expect(stdout.text()).toBe('')
    expect(stderr.text()).toBe('  ⚠️  careful\n')
  })

  it('ends the progress line on completion', () => {
    const stdout = sink()
    const logger = createLogger(false, false, { stdout, stderr: sink() })

    logger.progress('summarized', 2, 2)

    expect(stdout.text()).toBe(`\r  ${renderProgressBar(2, 2)} summarized\n`)
  })
})
