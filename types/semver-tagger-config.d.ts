import type { ReleaseChannel } from './release-channel'
import type { BumpLevel } from './bump-level'

/** Defaults read from `.semver-tagger.yml`. Every field is optional. */
export interface SemverTaggerConfig {
  /** Default release channel. */
  channel?: ReleaseChannel

  /** Require the prefix on user-supplied versions. */
  requirePrefix?: boolean

  /** Base version used when the repository has no release tags yet. */
  initial?: string

  /** Annotation message template. `{tag}` and `{version}` are replaced. */
  message?: string

  /** Git remote to push local tags to. */
  remote?: string

  /** Default bump level. */
  level?: BumpLevel

  /** Tag prefix. */
  prefix?: string

  /** Default `owner/name` repository for the GitHub API. */
  repo?: string

  /** Push local tags after creating them. */
  push?: boolean
}
