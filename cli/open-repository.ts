import type { TagSource } from '../types/tag-source'
import type { TagTarget } from '../types/tag-target'
import type { Settings } from './resolve-settings'

import { createGitHubRepository } from '../core/api/create-github-repository'
import { createLocalRepository } from '../core/git/create-local-repository'
import { createGitHubClient } from '../core/api/create-github-client'
import { parseRepository } from '../core/parsing/parse-repository'

/**
 * Pick the repository a run works on: GitHub when `repo` is set, otherwise
 * the local clone in `cwd`.
 *
 * @param settings - Effective settings.
 * @param cwd - Working directory.
 * @returns Tag source and target.
 */
export function openRepository(
  settings: Pick<Settings, 'remote' | 'push' | 'repo'>,
  cwd: string,
): TagSource & TagTarget {
  if (settings.repo) {
    return createGitHubRepository(
      createGitHubClient(),
      parseRepository(settings.repo),
    )
  }
  return createLocalRepository({
    remote: settings.remote,
    push: settings.push,
    cwd,
  })
}
