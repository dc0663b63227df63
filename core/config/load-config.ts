import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { parse } from 'yaml'

import type { SemverTaggerConfig } from '../../types/semver-tagger-config'

import { ConfigError } from '../errors/config-error'
import { CONFIG_FILE_NAMES } from '../constants'
import { parseConfig } from './parse-config'

/**
 * Load defaults from the first configuration file found in a directory.
 *
 * @param directory - Directory to look in.
 * @returns Configuration and the file it came from, or an empty configuration
 *   with a null path when no file exists.
 * @throws {ConfigError} When a file exists but cannot be parsed.
 */
export async function loadConfig(
  directory: string,
): Promise<{ config: SemverTaggerConfig; path: string | null }> {
  for (let name of CONFIG_FILE_NAMES) {
    let path = join(directory, name)
    let content: string

    try {
      content = await readFile(path, 'utf8')
    } catch (error) {
      if (isMissingFileError(error)) {
        continue
      }
      throw error
    }

    let document: unknown
    try {
      document = parse(content)
    } catch (error) {
      throw new ConfigError(
        error instanceof Error ? error.message : String(error),
        path,
      )
    }

    return { config: parseConfig(document, path), path }
  }

  return { config: {}, path: null }
}

/**
 * @param error - Error thrown by `readFile`.
 * @returns True for ENOENT.
 */
function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
