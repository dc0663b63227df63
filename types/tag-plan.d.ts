/** Everything needed to create one release tag. */
export interface TagPlan {
  /** Latest stable version found before this release, if any. */
  previous: string | null

  /** Commit SHA the tag will point to. */
  sha: string

  /** Version without prefix. */
  version: string

  /** Annotation message. Empty string creates a lightweight local tag. */
  message: string

  /** Tag name. */
  tag: string
}
