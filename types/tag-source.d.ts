import type { TagInfo } from './tag-info'

/** Where existing tags are read from (GitHub or a local clone). */
export interface TagSource {
  /** Resolve a reference to a commit SHA. */
  resolveSha(reference: string): Promise<string>

  /** List every tag of the repository. */
  listTags(): Promise<TagInfo[]>

  /** Whether the tag already exists. */
  hasTag(tag: string): Promise<boolean>

  /** Human readable description of the repository, used in messages. */
  describe(): string
}
