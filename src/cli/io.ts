/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import { InputFileError } from '../errors'

/**
 * Read an input file as UTF-8.
 *
 * @throws InputFileError when the file is missing or unreadable
 */
export async function readInputFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    const reason =
      error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : String(error)
    throw new InputFileError(path, reason)
  }
}

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Write a file, creating parent directories if needed.
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path))
  await writeFile(path, content)
}

/**
 * `<dir>/<input name without extension>_<suffix>.jsonl`, where dir defaults
 * to the input's directory.
 *
 * @example outputPathFor('data/chat.json', 'normalized') // 'data/chat_normalized.jsonl'
 */
export function outputPathFor(input: string, suffix: string, dir?: string): string {
  const name = basename(input, extname(input))
  return join(dir ?? dirname(input), `${name}_${suffix}.jsonl`)
}
