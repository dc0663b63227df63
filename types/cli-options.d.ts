/**
 * Options as parsed by cac. Numeric-looking values (a SHA made of digits, a
 * prefix such as `1`) arrive as numbers, so every value-taking option may be
 * a number.
 */
export interface CLIOptions {
  /** Message template for annotated tags. */
  message?: string | number

  /** Reject versions without the prefix. */
  requirePrefix?: boolean

  /** Base version for repositories without releases. */
  initial?: string | number

  /** Tag prefix. */
  prefix?: string | number

  /** Commit or reference to tag. */
  sha?: string | number

  /** Remote to push local tags to. */
  remote?: string | number

  /** Release channel. */
  channel?: string | number

  /** GitHub repository as `owner/name`; local clone when absent. */
  repo?: string | number

  /** Bump level. */
  level?: string | number

  /** Working directory. */
  cwd?: string | number

  /** Print the plan without creating anything. */
  dryRun?: boolean

  /** False with `--no-push`. */
  push?: boolean

  /** Skip the confirmation prompt. */
  yes?: boolean
}
