import { ConfigError } from '../errors/config-error'

/**
 * Parse a GitHub repository given as `owner/name` or as a github.com URL.
 *
 * @example
 *   parseRepository('https://github.com/octo/tools.git')
 *   // { owner: 'octo', repo: 'tools' }
 *
 * @param value - Repository reference.
 * @returns Owner and repository name.
 * @throws {ConfigError} When the value is not a repository reference.
 */
export function parseRepository(value: string): {
  owner: string
  repo: string
} {
  let normalized = value
    .trim()
    .replace(/^(?:https?:\/\/|git@)github\.com[/:]/u, '')
    .replace(/\.git$/u, '')
    .replace(/\/$/u, '')

  let match = normalized.match(
    /^(?<owner>[\dA-Za-z](?:[\dA-Za-z-]*[\dA-Za-z])?)\/(?<repo>[\w.-]+)$/u,
  )
  let owner = match?.groups?.['owner']
  let repo = match?.groups?.['repo']

  if (!owner || !repo || repo === '.' || repo === '..') {
    throw new ConfigError(
      `Invalid repository "${value}". Expected "owner/name".`,
      '--repo',
    )
  }

  return { owner, repo }
}
