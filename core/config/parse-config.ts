import type { SemverTaggerConfig } from '../../types/semver-tagger-config'

import { isReleaseChannel } from '../versions/is-release-channel'
import { isBumpLevel } from '../versions/is-bump-level'
import { ConfigError } from '../errors/config-error'

/** Keys holding strings without further constraints. */
const STRING_KEYS = ['initial', 'message', 'prefix', 'remote', 'repo'] as const

/** Keys holding booleans. */
const BOOLEAN_KEYS = ['requirePrefix', 'push'] as const

/**
 * Validate a parsed configuration document.
 *
 * An empty document (`null`) is an empty configuration. Unknown keys are
 * rejected so typos do not go unnoticed.
 *
 * @param value - Parsed YAML value.
 * @param source - File path, used in error messages.
 * @returns Validated configuration.
 * @throws {ConfigError} On the first invalid entry.
 */
export function parseConfig(value: unknown, source: string): SemverTaggerConfig {
  if (value === null || value === undefined) {
    return {}
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError('expected a mapping at the top level', source)
  }

  let config: SemverTaggerConfig = {}
  let known = new Set<string>([
    ...STRING_KEYS,
    ...BOOLEAN_KEYS,
    'channel',
    'level',
  ])

  for (let key of Object.keys(value)) {
    if (!known.has(key)) {
      throw new ConfigError(`unknown option "${key}"`, source)
    }
  }

  let object = new Map<string, unknown>(Object.entries(value))

  for (let key of STRING_KEYS) {
    let entry = object.get(key)
    if (entry === undefined) {
      continue
    }
    if (typeof entry !== 'string') {
      throw new ConfigError(`"${key}" must be a string`, source)
    }
    config[key] = entry
  }

  for (let key of BOOLEAN_KEYS) {
    let entry = object.get(key)
    if (entry === undefined) {
      continue
    }
    if (typeof entry !== 'boolean') {
      throw new ConfigError(`"${key}" must be true or false`, source)
    }
    config[key] = entry
  }

  let level = object.get('level')
  if (level !== undefined) {
    if (!isBumpLevel(level)) {
      throw new ConfigError(
        '"level" must be one of "major", "minor", "patch"',
        source,
      )
    }
    config.level = level
  }

  let channel = object.get('channel')
  if (channel !== undefined) {
    if (!isReleaseChannel(channel)) {
      throw new ConfigError(
        '"channel" must be one of "release", "beta", "rc"',
        source,
      )
    }
    config.channel = channel
  }

  return config
}
