import { appendFile } from 'node:fs/promises'
import { randomUUID } from 'node:crypto'

/**
 * Append step outputs to the file named by `GITHUB_OUTPUT`.
 *
 * Multi-line values use the heredoc form GitHub Actions expects.
 *
 * @param outputs - Output names and values.
 * @param environment - Environment to read `GITHUB_OUTPUT` from.
 * @returns False when not running inside GitHub Actions.
 */
export async function writeActionOutputs(
  outputs: Record<string, string>,
  environment: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
  let file = environment['GITHUB_OUTPUT']
  if (!file) {
    return false
  }

  let lines: string[] = []
  for (let [name, value] of Object.entries(outputs)) {
    if (value.includes('\n')) {
      let delimiter = `ghadelimiter_${randomUUID()}`
      lines.push(`${name}<<${delimiter}`, value, delimiter)
    } else {
      lines.push(`${name}=${value}`)
    }
  }

  await appendFile(file, `${lines.join('\n')}\n`, 'utf8')
  return true
}
