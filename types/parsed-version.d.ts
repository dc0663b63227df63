/** A validated semantic version together with the tag it maps to. */
export interface ParsedVersion {
  /** Pre-release identifiers (`['beta', 1]` for `1.0.0-beta.1`). */
  prerelease: (string | number)[]

  /** Build metadata identifiers. */
  build: string[]

  /** Version without prefix (e.g. `1.2.3-rc.1`). */
  version: string

  /** Prefix used to build the tag name. */
  prefix: string

  /** Raw input as received, before trimming. */
  input: string

  /** Tag name, always `prefix + version`. */
  tag: string

  major: number

  minor: number

  patch: number
}
