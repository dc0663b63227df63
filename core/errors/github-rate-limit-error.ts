/** Custom error for rate limit issues. */
export class GitHubRateLimitError extends Error {
  /** When the rate limit window resets. */
  public readonly resetAt: Date

  /**
   * Creates a new GitHubRateLimitError.
   *
   * @param resetAt - The time when the rate limit resets.
   */
  public constructor(resetAt: Date) {
    super(
      `GitHub API rate limit exceeded. Resets at ${resetAt.toISOString()}`,
    )
    this.name = 'GitHubRateLimitError'
    this.resetAt = resetAt
  }
}
