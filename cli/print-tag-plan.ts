import pc from 'picocolors'

import type { TagPlan } from '../types/tag-plan'

/**
 * Prints the tag about to be created.
 *
 * @param plan - Tag plan.
 * @param destination - Description of the repository receiving the tag.
 */
export function printTagPlan(plan: TagPlan, destination: string): void {
  console.info(
    `\n${pc.gray('Previous version:')} ${
      plan.previous ? pc.yellow(plan.previous) : pc.gray('none')
    }`,
  )
  console.info(
    `${pc.gray('New tag:')} ${pc.green(plan.tag)} ${pc.gray(
      `(${plan.sha.slice(0, 7)})`,
    )} → ${pc.cyan(destination)}`,
  )
  if (plan.message) {
    console.info(`${pc.gray('Message:')} ${plan.message}`)
  }
}
