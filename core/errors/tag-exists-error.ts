/** Raised when the tag about to be created is already present. */
export class TagExistsError extends Error {
  public readonly tag: string

  /**
   * Creates a new TagExistsError.
   *
   * @param tag - Name of the existing tag.
   * @param where - Description of the repository holding it.
   */
  public constructor(tag: string, where: string) {
    super(`Tag ${tag} already exists in ${where}`)
    this.name = 'TagExistsError'
    this.tag = tag
  }
}
