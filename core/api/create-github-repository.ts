import type { GitHubClient } from '../../types/github-client'
import type { TagSource } from '../../types/tag-source'
import type { TagTarget } from '../../types/tag-target'

/**
 * Bind tag reads and writes to a GitHub repository.
 *
 * Tags are listed once and reused by `hasTag`.
 *
 * @param client - GitHub API client.
 * @param repository - Repository coordinates.
 * @param repository.owner - Repository owner.
 * @param repository.repo - Repository name.
 * @returns Tag source and target for the repository.
 */
export function createGitHubRepository(
  client: GitHubClient,
  repository: { owner: string; repo: string },
): TagSource & TagTarget {
  let { owner, repo } = repository
  let tags: ReturnType<TagSource['listTags']> | null = null

  let listTags: TagSource['listTags'] = () => {
    tags ??= client.getAllTags(owner, repo)
    return tags
  }

  return {
    createTag: async plan => {
      await client.createTag(owner, repo, {
        message: plan.message || `Release ${plan.tag}`,
        sha: plan.sha,
        tag: plan.tag,
      })
    },
    hasTag: async tag => (await listTags()).some(info => info.tag === tag),
    resolveSha: reference => client.getCommitSha(owner, repo, reference),
    describe: () => `${owner}/${repo}`,
    listTags,
  }
}
