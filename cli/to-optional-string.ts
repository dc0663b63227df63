/**
 * @param value - Option value as parsed by cac.
 * @returns The value as a string, undefined when absent.
 */
export function toOptionalString(
  value: undefined | string | number,
): undefined | string {
  return value === undefined ? undefined : String(value)
}
