import semver from 'semver'

import type { VersionParseOptions } from '../../types/version-parse-options'
import type { ParsedVersion } from '../../types/parsed-version'

import { InvalidVersionError } from '../errors/invalid-version-error'
import { isValidSemver } from './is-valid-semver'
import { stripPrefix } from './strip-prefix'
import { formatTag } from './format-tag'

/**
 * Validate a user-supplied version and resolve the tag it maps to.
 *
 * Rules:
 *
 * - Surrounding whitespace is ignored.
 * - The prefix is removed once when present, and required when
 *   `requirePrefix` is set.
 * - What remains must match SemVer 2.0.0 exactly.
 * - The resulting tag always carries the prefix.
 *
 * @example
 *   parseVersion('1.2.3', { prefix: 'v', requirePrefix: false }).tag // 'v1.2.3'
 *
 * @param input - Raw version string.
 * @param options - Prefix handling.
 * @returns Parsed version.
 * @throws {InvalidVersionError} When the input is rejected.
 */
export function parseVersion(
  input: string,
  options: VersionParseOptions,
): ParsedVersion {
  let { requirePrefix, prefix } = options
  let trimmed = input.trim()

  if (trimmed === '') {
    throw new InvalidVersionError(input, 'version is empty')
  }

  let { hadPrefix, value } = stripPrefix(trimmed, prefix)

  if (requirePrefix && prefix !== '' && !hadPrefix) {
    throw new InvalidVersionError(input, `expected prefix "${prefix}"`)
  }

  if (!isValidSemver(value)) {
    throw new InvalidVersionError(
      input,
      'expected MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD]',
    )
  }

  /* The grammar matched, so only semver's length and integer limits remain. */
  let parsed = semver.parse(value)
  if (!parsed) {
    throw new InvalidVersionError(
      input,
      'version is too long or a number exceeds the safe integer range',
    )
  }

  return {
    prerelease: [...parsed.prerelease],
    tag: formatTag(value, prefix),
    build: [...parsed.build],
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
    version: value,
    prefix,
    input,
  }
}
