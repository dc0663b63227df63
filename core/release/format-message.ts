/**
 * Fill the `{tag}` and `{version}` placeholders of a message template.
 *
 * @param template - Message template.
 * @param values - Placeholder values.
 * @param values.tag - Tag name.
 * @param values.version - Version without prefix.
 * @returns Message.
 */
export function formatMessage(
  template: string,
  values: { version: string; tag: string },
): string {
  return template
    .replaceAll('{version}', values.version)
    .replaceAll('{tag}', values.tag)
}
