import type { TagInfo } from './tag-info'

/** Parameters of a tag to create through the API. */
export interface CreateTagParameters {
  /** Annotation message. */
  message: string

  /** Commit SHA the tag points to. */
  sha: string

  /** Tag name. */
  tag: string
}

/**
 * GitHub operations used by semver-tagger.
 *
 * Methods are thin wrappers around lower-level functions bound to a client
 * context (auth, rate limit, caches).
 */
export interface GitHubClient {
  /** Create an annotated tag object and its `refs/tags/*` reference. */
  createTag(
    owner: string,
    repo: string,
    parameters: CreateTagParameters,
  ): Promise<TagInfo>

  /** Resolve a branch, tag or SHA to a commit SHA. */
  getCommitSha(owner: string, repo: string, reference: string): Promise<string>

  /** List every repository tag (name + commit SHA). */
  getAllTags(owner: string, repo: string): Promise<TagInfo[]>

  /** Current rate limit snapshot. */
  getRateLimitStatus(): { remaining: number; resetAt: Date }

  /** True when remaining requests are below a threshold. */
  shouldWaitForRateLimit(threshold?: number): boolean

  /** Whether a token is available for write operations. */
  hasToken(): boolean
}
