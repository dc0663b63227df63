import { execFileSync } from 'node:child_process'

/**
 * Resolve a GitHub token with descending priority.
 *
 * Priority:
 *
 * 1. Env GITHUB_TOKEN
 * 2. Env GH_TOKEN
 * 3. `gh auth token`
 *
 * Failures of the `gh` lookup are treated as "no token".
 *
 * @returns Token string or undefined when not found.
 */
export function resolveGitHubTokenSync(): undefined | string {
  for (let name of ['GITHUB_TOKEN', 'GH_TOKEN']) {
    let value = process.env[name]?.trim()
    if (value) {
      return value
    }
  }

  try {
    let output = execFileSync('gh', ['auth', 'token'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      encoding: 'utf8',
      timeout: 500,
    })
    return output.trim() || undefined
  } catch {
    /** The gh CLI is missing or not logged in. */
    return undefined
  }
}
