import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { TagInfo } from '../../types/tag-info'

import { makeRequest } from './make-request'

/** Page size requested from the tags endpoint (the API maximum). */
const PER_PAGE = 100

/**
 * Fetch repository tags, following pages until a short page or the page cap.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.maxPages - Upper bound on requested pages.
 * @returns Tag names with their commit SHAs.
 */
export async function getAllTags(
  context: GitHubClientContext,
  parameters: { maxPages?: number; owner: string; repo: string },
): Promise<TagInfo[]> {
  let { maxPages = 10, owner, repo } = parameters
  let result: TagInfo[] = []

  for (let page = 1; page <= maxPages; page++) {
    let resp = await makeRequest(
      context,
      `/repos/${owner}/${repo}/tags?per_page=${PER_PAGE}&page=${page}`,
    )
    let tags = resp.data as components['schemas']['tag'][]

    for (let tag of tags) {
      result.push({ sha: tag.commit.sha, tag: tag.name })
    }

    if (tags.length < PER_PAGE) {
      break
    }
  }

  return result
}
