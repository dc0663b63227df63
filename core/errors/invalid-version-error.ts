/** Raised when a string is not an acceptable semantic version. */
export class InvalidVersionError extends Error {
  /** The rejected input, as received. */
  public readonly input: string

  /** Why the input was rejected. */
  public readonly reason: string

  /**
   * Creates a new InvalidVersionError.
   *
   * @param input - The rejected input.
   * @param reason - Why it was rejected.
   */
  public constructor(input: string, reason: string) {
    super(`Invalid version "${input}": ${reason}`)
    this.name = 'InvalidVersionError'
    this.input = input
    this.reason = reason
  }
}
