/**
 * Build a tag name from a version.
 *
 * @param version - Version without prefix.
 * @param prefix - Tag prefix.
 * @returns Tag name.
 */
export function formatTag(version: string, prefix: string): string {
  return `${prefix}${version}`
}
