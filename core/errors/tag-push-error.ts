/** The tag was created in the local clone but the push failed. */
export class TagPushError extends Error {
  public readonly remote: string

  public readonly tag: string

  /**
   * Creates a new TagPushError.
   *
   * @param tag - Tag kept in the local clone.
   * @param remote - Remote the push went to.
   * @param cause - Failure of the push.
   */
  public constructor(tag: string, remote: string, cause: unknown) {
    super(
      `Tag ${tag} was created locally but could not be pushed to ${remote}` +
        `${cause instanceof Error ? `: ${cause.message}` : ''}. ` +
        `The local tag was kept; push it with "git push ${remote} refs/tags/${tag}"`,
      { cause },
    )
    this.name = 'TagPushError'
    this.remote = remote
    this.tag = tag
  }
}
