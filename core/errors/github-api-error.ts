/** Non-2xx response from the GitHub REST API. */
export class GitHubApiError extends Error {
  /** HTTP status code. */
  public readonly status: number

  /**
   * Creates a new GitHubApiError.
   *
   * @param status - HTTP status code.
   * @param statusText - HTTP status text.
   * @param detail - Message reported by GitHub in the response body, if any.
   */
  public constructor(status: number, statusText: string, detail?: string) {
    super(
      `GitHub API error: ${status} ${statusText}` +
        (detail ? ` (${detail})` : ''),
    )
    this.name = 'GitHubApiError'
    this.status = status
  }
}
