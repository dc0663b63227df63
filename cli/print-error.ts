import pc from 'picocolors'

import { GitHubRateLimitError } from '../core/errors/github-rate-limit-error'
import { InvalidVersionError } from '../core/errors/invalid-version-error'
import { MissingTokenError } from '../core/errors/missing-token-error'
import { TagExistsError } from '../core/errors/tag-exists-error'

/**
 * Prints an error with a hint for the failures users can fix themselves.
 *
 * @param error - Error caught at the command boundary.
 */
export function printError(error: unknown): void {
  if (error instanceof GitHubRateLimitError) {
    console.error(pc.yellow('\n⚠️ Rate Limit Exceeded\n'))
    console.error(error.message)
    console.error(
      pc.gray('\nExample: GITHUB_TOKEN=<token> semver-tagger --repo o/r\n'),
    )
    return
  }

  if (error instanceof MissingTokenError) {
    console.error(pc.redBright('\nError:'), error.message)
    console.error(
      pc.gray('\nSet GITHUB_TOKEN or GH_TOKEN, or run `gh auth login`.\n'),
    )
    return
  }

  if (error instanceof TagExistsError || error instanceof InvalidVersionError) {
    console.error(pc.yellow(`\n${error.message}\n`))
    return
  }

  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
}
