import type { GitHubClientContext } from '../../types/github-client-context'

/**
 * Copy rate limit state from response headers into the client context.
 * Headers that are missing or not numeric leave the previous value in place.
 *
 * @param context - Client context with mutable rate limit fields.
 * @param headers - Response headers.
 */
export function updateRateLimitInfo(
  context: GitHubClientContext,
  headers: Headers,
): void {
  let remaining = Number.parseInt(headers.get('x-ratelimit-remaining') ?? '', 10)
  if (Number.isFinite(remaining)) {
    context.rateLimitRemaining = remaining
  }

  let reset = Number.parseInt(headers.get('x-ratelimit-reset') ?? '', 10)
  if (Number.isFinite(reset)) {
    context.rateLimitReset = new Date(reset * 1000)
  }
}
