import type { ReleaseChannel } from '../../types/release-channel'
import type { BumpLevel } from '../../types/bump-level'
import type { TagSource } from '../../types/tag-source'
import type { TagPlan } from '../../types/tag-plan'

import { generateNextVersion } from '../versions/generate-next-version'
import { formatTag } from '../versions/format-tag'
import { DEFAULT_REFERENCE } from '../constants'
import { formatMessage } from './format-message'

/** Options of {@link planReleaseTag}. */
export interface PlanReleaseTagOptions {
  /** Commit or reference to tag, `HEAD` when absent. */
  sha?: string | null

  /** Release channel. */
  channel: ReleaseChannel

  /** Base version for repositories without releases. */
  initial: string

  /** Message template with `{tag}` and `{version}` placeholders. */
  message: string

  /** Bump level. */
  level: BumpLevel

  /** Tag prefix. */
  prefix: string
}

/**
 * Work out the next release tag of a repository.
 *
 * @param source - Repository to read tags from.
 * @param options - Bump options.
 * @returns Plan describing the tag to create.
 */
export async function planReleaseTag(
  source: TagSource,
  options: PlanReleaseTagOptions,
): Promise<TagPlan> {
  let { channel, initial, message, prefix, level } = options

  let tags = await source.listTags()
  let { previous, version } = generateNextVersion({
    channel,
    initial,
    prefix,
    level,
    tags,
  })
  let tag = formatTag(version, prefix)
  let sha = await source.resolveSha(options.sha ?? DEFAULT_REFERENCE)

  return {
    message: formatMessage(message, { version, tag }),
    previous,
    version,
    sha,
    tag,
  }
}
