import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'

import { makeRequest } from './make-request'

/**
 * Resolve a reference (branch, tag, SHA or `HEAD`) to a commit SHA.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.reference - Reference to resolve.
 * @returns Full commit SHA.
 */
export async function getCommitSha(
  context: GitHubClientContext,
  parameters: { reference: string; owner: string; repo: string },
): Promise<string> {
  let { reference, owner, repo } = parameters
  let cacheKey = `${owner}/${repo}#${reference}`
  let cached = context.caches.commitSha.get(cacheKey)
  if (cached) {
    return cached
  }

  let resp = await makeRequest(
    context,
    `/repos/${owner}/${repo}/commits/${encodeURIComponent(reference)}`,
  )
  let { sha } = resp.data as components['schemas']['commit']

  context.caches.commitSha.set(cacheKey, sha)
  return sha
}
