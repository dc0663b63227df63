import semver from 'semver'

import type { TagInfo } from '../../types/tag-info'

import { isValidSemver } from './is-valid-semver'
import { stripPrefix } from './strip-prefix'

/**
 * Find the highest version among tag names carrying the prefix.
 *
 * Tags without the prefix, or whose remainder is not a semantic version, are
 * ignored, and so are versions past the safe integer or length limits.
 * Pre-releases are ignored unless requested. Build metadata does not take
 * part in the ordering: among equal versions the first tag listed wins.
 *
 * @param tags - Repository tags.
 * @param options - Lookup options.
 * @param options.prefix - Tag prefix.
 * @param options.includePrerelease - Consider pre-release versions too.
 * @returns Highest version without prefix, or null when none qualifies.
 */
export function getLatestVersion(
  tags: TagInfo[],
  options: { includePrerelease?: boolean; prefix: string },
): string | null {
  let { includePrerelease = false, prefix } = options
  let versions: string[] = []

  for (let { tag } of tags) {
    let { hadPrefix, value } = stripPrefix(tag, prefix)
    if (prefix !== '' && !hadPrefix) {
      continue
    }
    if (!isValidSemver(value) || !semver.parse(value)) {
      continue
    }
    if (!includePrerelease && semver.prerelease(value)) {
      continue
    }
    versions.push(value)
  }

  return versions.sort(semver.rcompare)[0] ?? null
}
