import type { VersionParseOptions } from '../../types/version-parse-options'
import type { TagSource } from '../../types/tag-source'
import type { TagPlan } from '../../types/tag-plan'

import { getLatestVersion } from '../versions/get-latest-version'
import { TagExistsError } from '../errors/tag-exists-error'
import { parseVersion } from '../versions/parse-version'
import { DEFAULT_REFERENCE } from '../constants'
import { formatMessage } from './format-message'

/**
 * Turn a user-supplied version into a tag plan.
 *
 * @param source - Repository the tag is created in.
 * @param input - Raw version string.
 * @param options - Prefix handling, target commit and message template.
 * @returns Plan describing the tag to create.
 * @throws {InvalidVersionError} When the input is not an acceptable version.
 * @throws {TagExistsError} When the tag is already present.
 */
export async function createManualTagPlan(
  source: TagSource,
  input: string,
  options: { sha?: string | null; message: string } & VersionParseOptions,
): Promise<TagPlan> {
  let parsed = parseVersion(input, options)

  if (await source.hasTag(parsed.tag)) {
    throw new TagExistsError(parsed.tag, source.describe())
  }

  let previous = getLatestVersion(await source.listTags(), {
    prefix: options.prefix,
  })
  let sha = await source.resolveSha(options.sha ?? DEFAULT_REFERENCE)

  return {
    message: formatMessage(options.message, {
      version: parsed.version,
      tag: parsed.tag,
    }),
    version: parsed.version,
    tag: parsed.tag,
    previous,
    sha,
  }
}
