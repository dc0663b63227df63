import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubClient } from '../../types/github-client'

import { resolveGitHubTokenSync } from './resolve-github-token-sync'
import { GITHUB_API_URL } from '../constants'
import { getCommitSha } from './get-commit-sha'
import { getAllTags } from './get-all-tags'
import { createTag } from './create-tag'

/**
 * Create a functional GitHub API client with internal caches and rate-limit
 * tracking.
 *
 * @param token - Optional GitHub token override.
 * @returns Client with bound methods.
 */
export function createGitHubClient(token?: string): GitHubClient {
  let resolved = token ?? resolveGitHubTokenSync()

  let context: GitHubClientContext = {
    rateLimitRemaining: resolved ? 5000 : 60,
    caches: { commitSha: new Map() },
    rateLimitReset: new Date(),
    baseUrl: GITHUB_API_URL,
    token: resolved,
  }

  return {
    getRateLimitStatus: () => ({
      remaining: context.rateLimitRemaining,
      resetAt: context.rateLimitReset,
    }),
    createTag: (owner, repo, parameters) =>
      createTag(context, { ...parameters, owner, repo }),
    getCommitSha: (owner, repo, reference) =>
      getCommitSha(context, { reference, owner, repo }),
    shouldWaitForRateLimit: (threshold: number = 100) =>
      context.rateLimitRemaining < threshold,
    getAllTags: (owner, repo) => getAllTags(context, { owner, repo }),
    hasToken: () => Boolean(context.token),
  }
}
