import type { TagPlan } from './tag-plan'

/** Where a planned tag is written to. */
export interface TagTarget {
  /** Create the tag (and publish it, where the target supports that). */
  createTag(plan: TagPlan): Promise<void>

  /** Human readable description of the destination, used in messages. */
  describe(): string
}
