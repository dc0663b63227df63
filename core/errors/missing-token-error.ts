/** A write to the GitHub API was attempted without credentials. */
export class MissingTokenError extends Error {
  public constructor() {
    super('A GitHub token is required to create tags through the API')
    this.name = 'MissingTokenError'
  }
}
