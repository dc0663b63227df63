import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { CreateTagParameters } from '../../types/github-client'
import type { TagInfo } from '../../types/tag-info'

import { MissingTokenError } from '../errors/missing-token-error'
import { GitHubApiError } from '../errors/github-api-error'
import { TagExistsError } from '../errors/tag-exists-error'
import { makeRequest } from './make-request'

/**
 * Create an annotated tag through the Git database API.
 *
 * Two calls are needed: the tag object (`POST /git/tags`), then the
 * `refs/tags/<name>` reference pointing at it (`POST /git/refs`). GitHub
 * answers 422 on the second call when the reference already exists.
 *
 * @param context - Client context.
 * @param parameters - Repository and tag parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @returns The created tag and the commit it points to.
 * @throws {MissingTokenError} When the client has no token.
 * @throws {TagExistsError} When the reference already exists.
 */
export async function createTag(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string } & CreateTagParameters,
): Promise<TagInfo> {
  let { message, owner, repo, sha, tag } = parameters

  if (!context.token) {
    throw new MissingTokenError()
  }

  let tagResp = await makeRequest(context, `/repos/${owner}/${repo}/git/tags`, {
    body: { type: 'commit', object: sha, message, tag },
    method: 'POST',
  })
  let tagObject = tagResp.data as components['schemas']['git-tag']

  try {
    await makeRequest(context, `/repos/${owner}/${repo}/git/refs`, {
      body: { ref: `refs/tags/${tag}`, sha: tagObject.sha },
      method: 'POST',
    })
  } catch (error) {
    if (error instanceof GitHubApiError && error.status === 422) {
      throw new TagExistsError(tag, `${owner}/${repo}`)
    }
    throw error
  }

  return { sha: tagObject.object.sha, tag }
}
