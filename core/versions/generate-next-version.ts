import semver from 'semver'

import type { ReleaseChannel } from '../../types/release-channel'
import type { BumpLevel } from '../../types/bump-level'
import type { TagInfo } from '../../types/tag-info'

import { InvalidVersionError } from '../errors/invalid-version-error'
import { getLatestVersion } from './get-latest-version'
import { isValidSemver } from './is-valid-semver'
import { stripPrefix } from './strip-prefix'

/** Result of a version computation. */
export interface NextVersion {
  /** Latest stable version the bump started from, null for a fresh repo. */
  previous: string | null

  /** Next version without prefix. */
  version: string
}

/**
 * Compute the next version from the existing tags.
 *
 * The latest stable version (or `initial` when there is none) is incremented
 * by `level`. On `beta` and `rc` channels the result gets a `<channel>.<n>`
 * pre-release suffix, where `n` follows the highest existing number for the
 * same version and channel.
 *
 * @example
 *   // Tags: v1.2.0, v1.2.1-rc.1
 *   generateNextVersion({ level: 'patch', channel: 'rc', ... }).version
 *   // '1.2.1-rc.2'
 *
 * @param parameters - Computation parameters.
 * @param parameters.tags - Existing repository tags.
 * @param parameters.level - Bump level.
 * @param parameters.channel - Release channel.
 * @param parameters.prefix - Tag prefix.
 * @param parameters.initial - Base version for repositories without releases.
 * @returns Previous and next versions.
 */
export function generateNextVersion(parameters: {
  channel: ReleaseChannel
  tags: TagInfo[]
  level: BumpLevel
  initial: string
  prefix: string
}): NextVersion {
  let { channel, initial, prefix, level, tags } = parameters

  if (!isValidSemver(initial)) {
    throw new InvalidVersionError(initial, 'initial version is not SemVer')
  }

  let previous = getLatestVersion(tags, { prefix })
  let bumped = semver.inc(previous ?? initial, level)
  if (!bumped) {
    throw new InvalidVersionError(previous ?? initial, `cannot bump ${level}`)
  }

  if (channel === 'release') {
    return { version: bumped, previous }
  }

  let number = findLastPrereleaseNumber(tags, { channel, prefix, bumped }) + 1
  return { version: `${bumped}-${channel}.${number}`, previous }
}

/**
 * Highest `n` among tags of the form `<prefix><bumped>-<channel>.<n>`.
 *
 * @param tags - Existing repository tags.
 * @param parameters - Lookup parameters.
 * @param parameters.bumped - Stable version the pre-release belongs to.
 * @param parameters.channel - Pre-release channel.
 * @param parameters.prefix - Tag prefix.
 * @returns Highest number found, 0 when none.
 */
function findLastPrereleaseNumber(
  tags: TagInfo[],
  parameters: { channel: ReleaseChannel; bumped: string; prefix: string },
): number {
  let { channel, bumped, prefix } = parameters
  let last = 0

  for (let { tag } of tags) {
    let { hadPrefix, value } = stripPrefix(tag, prefix)
    if ((prefix !== '' && !hadPrefix) || !isValidSemver(value)) {
      continue
    }

    let parsed = semver.parse(value)
    if (
      !parsed ||
      `${parsed.major}.${parsed.minor}.${parsed.patch}` !== bumped
    ) {
      continue
    }

    let [name, number] = parsed.prerelease
    if (
      parsed.prerelease.length === 2 &&
      name === channel &&
      typeof number === 'number' &&
      number > last
    ) {
      last = number
    }
  }

  return last
}
