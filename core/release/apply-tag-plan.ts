import type { TagTarget } from '../../types/tag-target'
import type { TagPlan } from '../../types/tag-plan'

/**
 * Create the planned tag, unless running dry.
 *
 * @param target - Where to create the tag.
 * @param plan - Tag to create.
 * @param options - Apply options.
 * @param options.dryRun - Skip all writes.
 * @returns Whether the tag was created and where.
 */
export async function applyTagPlan(
  target: TagTarget,
  plan: TagPlan,
  options: { dryRun: boolean },
): Promise<{ destination: string; created: boolean }> {
  let destination = target.describe()
  if (options.dryRun) {
    return { created: false, destination }
  }
  await target.createTag(plan)
  return { created: true, destination }
}
