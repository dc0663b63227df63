/** Tag name and the commit it points to, when known. */
export interface TagInfo {
  /** Commit SHA of the tag, null for sources that do not report it. */
  sha: string | null

  /** Tag name (e.g. `v1.2.3`). */
  tag: string
}
