// Small file utilities for codegen outputs.

import { dirname } from 'node:path'
import { mkdir, writeFile as fsWriteFile } from 'node:fs/promises'
import { OutputWriteError, errorMessage } from '../core/errors.js'

/**
 * Ensure the parent directory of the given file path exists.
 */
export async function ensureDirectoryForFile(filePath: string): Promise<void> {
  const dir = dirname(filePath)
  await mkdir(dir, { recursive: true })
}

/**
 * Write a generated file, creating parent directories if needed.
 * Failures surface as OutputWriteError naming the target path.
 */
export async function writeFileRecursive(filePath: string, contents: string): Promise<void> {
  try {
    await ensureDirectoryForFile(filePath)
    await fsWriteFile(filePath, contents, 'utf8')
  } catch (error) {
    throw new OutputWriteError(filePath, errorMessage(error))
  }
}
