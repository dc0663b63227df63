import { execFile } from 'node:child_process'

import { GitCommandError } from '../errors/git-command-error'

/**
 * Run `git` in a working directory.
 *
 * @param args - Arguments passed to git.
 * @param options - Execution options.
 * @param options.cwd - Working directory (inside the repository).
 * @returns Trimmed standard output.
 * @throws {GitCommandError} When git cannot be spawned or exits non-zero.
 */
export function runGit(
  args: string[],
  options: { cwd: string },
): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      'git',
      args,
      {
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        maxBuffer: 16 * 1024 * 1024,
        cwd: options.cwd,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (error) {
          let exitCode = typeof error.code === 'number' ? error.code : null
          reject(new GitCommandError(args, exitCode, stderr || error.message))
          return
        }
        resolve(stdout.trim())
      },
    )
  })
}
