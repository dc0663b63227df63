import { runGit } from './run-git'

/**
 * Resolve a reference of the local repository to a commit SHA.
 *
 * @param cwd - Working directory inside the repository.
 * @param reference - Branch, tag, SHA or `HEAD`.
 * @returns Full commit SHA.
 */
export function resolveLocalSha(
  cwd: string,
  reference: string,
): Promise<string> {
  return runGit(['rev-parse', '--verify', `${reference}^{commit}`], { cwd })
}
