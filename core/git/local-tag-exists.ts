import { GitCommandError } from '../errors/git-command-error'
import { runGit } from './run-git'

/**
 * Check whether a tag exists in the local repository.
 *
 * @param cwd - Working directory inside the repository.
 * @param tag - Tag name.
 * @returns True when `refs/tags/<tag>` resolves.
 */
export async function localTagExists(
  cwd: string,
  tag: string,
): Promise<boolean> {
  try {
    await runGit(['rev-parse', '-q', '--verify', `refs/tags/${tag}`], { cwd })
    return true
  } catch (error) {
    /* `rev-parse -q --verify` exits with 1 and no output for unknown refs. */
    if (error instanceof GitCommandError && error.exitCode === 1) {
      return false
    }
    throw error
  }
}
