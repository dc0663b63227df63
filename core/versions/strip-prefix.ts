/**
 * Remove a tag prefix once, if present.
 *
 * @param value - Value that may start with the prefix.
 * @param prefix - Prefix to remove. An empty prefix never matches.
 * @returns The value without prefix and whether the prefix was found.
 */
export function stripPrefix(
  value: string,
  prefix: string,
): { hadPrefix: boolean; value: string } {
  if (prefix !== '' && value.startsWith(prefix)) {
    return { value: value.slice(prefix.length), hadPrefix: true }
  }
  return { hadPrefix: false, value }
}
