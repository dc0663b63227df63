import pc from 'picocolors'

import type { TagTarget } from '../types/tag-target'
import type { TagPlan } from '../types/tag-plan'
import type { Settings } from './resolve-settings'

import { confirmTagCreation } from '../core/interactive/confirm-tag-creation'
import { writeActionOutputs } from '../core/actions/write-action-outputs'
import { applyTagPlan } from '../core/release/apply-tag-plan'
import { printTagPlan } from './print-tag-plan'
import { withSpinner } from './with-spinner'

/**
 * Show the plan, ask for confirmation when interactive, create the tag and
 * report the result as step outputs.
 *
 * @param target - Where the tag is created.
 * @param plan - Tag to create.
 * @param settings - Effective settings.
 * @param interactive - Whether a confirmation can be asked.
 * @returns Whether the tag was created.
 */
export async function createPlannedTag(
  target: TagTarget,
  plan: TagPlan,
  settings: Pick<Settings, 'dryRun' | 'yes'>,
  interactive: boolean = Boolean(process.stdin.isTTY),
): Promise<boolean> {
  let destination = target.describe()
  printTagPlan(plan, destination)

  let created = false

  if (settings.dryRun) {
    console.info(pc.yellow('\n📋 Dry Run - No tag will be created\n'))
  } else if (
    !settings.yes &&
    interactive &&
    !(await confirmTagCreation(plan, destination))
  ) {
    console.info(pc.gray('\nNo tag created'))
  } else {
    ;({ created } = await withSpinner(
      `Creating ${plan.tag}...`,
      () => applyTagPlan(target, plan, { dryRun: false }),
      () => `Created ${pc.green(plan.tag)} in ${destination}`,
    ))
  }

  await writeActionOutputs({
    previous: plan.previous ?? '',
    created: String(created),
    version: plan.version,
    tag: plan.tag,
    sha: plan.sha,
  })

  return created
}
