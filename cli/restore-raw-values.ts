import type { CLIOptions } from '../types/cli-options'

const VALUE_OPTIONS = [
  'channel',
  'initial',
  'message',
  'prefix',
  'remote',
  'level',
  'repo',
  'cwd',
  'sha',
] as const

/**
 * Put back the command-line text of options cac turned into numbers.
 *
 * A SHA such as `0123456` parses as the number 123456, so the value is read
 * again from the arguments as typed.
 *
 * @param options - Options as parsed by cac.
 * @param argv - Process arguments.
 * @returns Options with value-taking flags as the strings given.
 */
export function restoreRawValues(
  options: CLIOptions,
  argv: string[],
): CLIOptions {
  let restored: CLIOptions = { ...options }
  for (let name of VALUE_OPTIONS) {
    if (typeof restored[name] !== 'number') {
      continue
    }
    let raw = readRawOption(argv, name)
    if (raw !== undefined) {
      restored[name] = raw
    }
  }
  return restored
}

/**
 * @param argv - Process arguments.
 * @param name - Long option name.
 * @returns Last value given as `--name value` or `--name=value`.
 */
function readRawOption(argv: string[], name: string): undefined | string {
  let flag = `--${name}`
  let value: undefined | string

  for (let index = 0; index < argv.length; index++) {
    let argument = argv[index]
    if (argument === '--') {
      break
    }
    if (argument === flag) {
      value = argv[index + 1]
    } else if (argument?.startsWith(`${flag}=`)) {
      value = argument.slice(flag.length + 1)
    }
  }

  return value
}
