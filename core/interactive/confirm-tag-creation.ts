import enquirer from 'enquirer'
import pc from 'picocolors'

import type { TagPlan } from '../../types/tag-plan'

/**
 * Ask the user to confirm the tag about to be created.
 *
 * Cancelling the prompt (Ctrl-C, Esc) counts as a refusal.
 *
 * @param plan - Tag to create.
 * @param destination - Description of the repository receiving the tag.
 * @returns True when the user accepted.
 */
export async function confirmTagCreation(
  plan: TagPlan,
  destination: string,
): Promise<boolean> {
  try {
    let { confirmed } = await enquirer.prompt<{ confirmed: boolean }>({
      message: `Create ${pc.green(plan.tag)} at ${pc.gray(
        plan.sha.slice(0, 7),
      )} in ${destination}?`,
      name: 'confirmed',
      type: 'confirm',
      initial: true,
    })
    return confirmed
  } catch (error) {
    /* Enquirer rejects with an empty string when the prompt is cancelled. */
    if (
      error === '' ||
      (error instanceof Error &&
        (error.message.includes('cancelled') ||
          error.name === 'ExitPromptError'))
    ) {
      console.info(`\r\u001B[K${pc.yellow('Cancelled')}`)
      return false
    }
    throw error
  }
}
