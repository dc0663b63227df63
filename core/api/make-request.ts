import type { GitHubClientContext } from '../../types/github-client-context'

import { GitHubRateLimitError } from '../errors/github-rate-limit-error'
import { updateRateLimitInfo } from './update-rate-limit-info'
import { GitHubApiError } from '../errors/github-api-error'
import { version } from '../../package.json'

/** Request options understood by {@link makeRequest}. */
export interface RequestOptions {
  /** HTTP method, GET by default. */
  method?: 'PATCH' | 'POST' | 'GET'

  /** JSON-serializable request body. */
  body?: unknown
}

/**
 * Perform an HTTP request against GitHub API with auth and rate-limit updates.
 *
 * @param context - Client context with token and rate-limit state.
 * @param path - API path beginning with '/'.
 * @param options - Method and body.
 * @returns HTTP status and parsed JSON body.
 * @throws {GitHubRateLimitError} When GitHub reports an exhausted rate limit.
 * @throws {GitHubApiError} For any other non-2xx response.
 */
export async function makeRequest(
  context: GitHubClientContext,
  path: string,
  options: RequestOptions = {},
): Promise<{ status: number; data: unknown }> {
  let { method = 'GET', body } = options

  let headers: Record<string, string> = {
    'User-Agent': `semver-tagger/${version}`,
    'X-GitHub-Api-Version': '2022-11-28',
    Accept: 'application/vnd.github+json',
  }

  if (context.token) {
    headers['Authorization'] = `Bearer ${context.token}`
  }

  if (body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  let response = await fetch(`${context.baseUrl}${path}`, {
    body: body === undefined ? undefined : JSON.stringify(body),
    headers,
    method,
  })

  updateRateLimitInfo(context, response.headers)

  if (!response.ok) {
    let text = await response.text()

    if (
      (response.status === 403 || response.status === 429) &&
      text.toLowerCase().includes('rate limit')
    ) {
      throw new GitHubRateLimitError(context.rateLimitReset)
    }

    throw new GitHubApiError(
      response.status,
      response.statusText,
      readErrorMessage(text),
    )
  }

  if (response.status === 204) {
    return { status: response.status, data: null }
  }

  let data: unknown = await response.json()
  return { status: response.status, data }
}

/**
 * Extract the `message` field GitHub puts in error bodies.
 *
 * @param text - Raw response body.
 * @returns The message, or undefined when the body is not a GitHub error.
 */
function readErrorMessage(text: string): undefined | string {
  try {
    let parsed: unknown = JSON.parse(text)
    if (
      parsed &&
      typeof parsed === 'object' &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      return parsed.message
    }
  } catch {
    /* Not JSON. */
  }
  return undefined
}
