/**
 * Internal client context shared by all API functions.
 *
 * Stores auth, rate-limit state, base URL and in-memory caches so a single run
 * does not ask for the same data twice.
 */
export interface GitHubClientContext {
  caches: {
    /** Commit SHAs keyed by `owner/repo#ref`. */
    commitSha: Map<string, string>
  }

  /** Remaining requests available in the current rate-limit window. */
  rateLimitRemaining: number

  /** GitHub token, if available. */
  token: undefined | string

  /** Time when the rate limit resets. */
  rateLimitReset: Date

  /** GitHub REST API base URL. */
  baseUrl: string
}
