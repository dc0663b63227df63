/** A `git` invocation that exited with a non-zero status. */
export class GitCommandError extends Error {
  public readonly exitCode: number | null

  public readonly stderr: string

  public readonly args: string[]

  /**
   * Creates a new GitCommandError.
   *
   * @param args - Arguments passed to git.
   * @param exitCode - Process exit code, null when the process was killed.
   * @param stderr - Captured standard error output.
   */
  public constructor(args: string[], exitCode: number | null, stderr: string) {
    let details = stderr.trim()
    super(
      `git ${args.join(' ')} failed` +
        (exitCode === null ? '' : ` with exit code ${exitCode}`) +
        (details ? `: ${details}` : ''),
    )
    this.name = 'GitCommandError'
    this.exitCode = exitCode
    this.stderr = stderr
    this.args = args
  }
}
