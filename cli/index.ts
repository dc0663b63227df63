import pc from 'picocolors'
import cac from 'cac'

import type { ParsedVersion } from '../types/parsed-version'
import type { CLIOptions } from '../types/cli-options'

import { createManualTagPlan } from '../core/release/create-manual-tag-plan'
import { writeActionOutputs } from '../core/actions/write-action-outputs'
import { InvalidVersionError } from '../core/errors/invalid-version-error'
import { planReleaseTag } from '../core/release/plan-release-tag'
import { parseVersion } from '../core/versions/parse-version'
import { createPlannedTag } from './create-planned-tag'
import { loadConfig } from '../core/config/load-config'
import { restoreRawValues } from './restore-raw-values'
import { toOptionalString } from './to-optional-string'
import { resolveSettings } from './resolve-settings'
import { openRepository } from './open-repository'
import { version } from '../package.json'
import { withSpinner } from './with-spinner'
import { printError } from './print-error'

/**
 * Run the CLI.
 *
 * @param argv - Process arguments, including the node and script paths.
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  let cli = cac('semver-tagger')

  cli
    .help()
    .version(version)
    .option('--cwd <directory>', 'Repository directory (default: current)')
    .option('--prefix <prefix>', 'Tag prefix (default: v)')
    .option('--require-prefix', 'Reject versions without the prefix')
    .option('--repo <owner/name>', 'Tag through the GitHub API')
    .option('--sha <commit>', 'Commit to tag (default: HEAD)')
    .option('--message <text>', 'Tag message, {tag} and {version} expand')
    .option('--remote <name>', 'Remote to push to (default: origin)')
    .option('--no-push', 'Create the local tag without pushing it')
    .option('--dry-run', 'Preview the tag without creating it')
    .option('--yes, -y', 'Skip the confirmation')

  cli
    .command('validate <version>', 'Check that a version is valid SemVer')
    .action((input: string, parsedOptions: CLIOptions) =>
      handle(async () => {
        let options = restoreRawValues(parsedOptions, argv)
        let cwd = toOptionalString(options.cwd) ?? process.cwd()
        let { config } = await loadConfig(cwd)
        let settings = resolveSettings(options, config)

        let parsed: ParsedVersion
        try {
          parsed = parseVersion(input, settings)
        } catch (error) {
          if (error instanceof InvalidVersionError) {
            await writeActionOutputs({ valid: 'false' })
          }
          throw error
        }

        console.info(
          `${pc.green('✓')} ${pc.bold(parsed.tag)} ${pc.gray(
            `(version ${parsed.version})`,
          )}`,
        )
        await writeActionOutputs({
          version: parsed.version,
          tag: parsed.tag,
          valid: 'true',
        })
      }),
    )

  cli
    .command('tag <version>', 'Validate a version, then create its tag')
    .action((input: string, parsedOptions: CLIOptions) =>
      handle(async () => {
        let options = restoreRawValues(parsedOptions, argv)
        let cwd = toOptionalString(options.cwd) ?? process.cwd()
        let { config } = await loadConfig(cwd)
        let settings = resolveSettings(options, config)
        let repository = openRepository(settings, cwd)

        let plan = await withSpinner(
          'Checking version...',
          () => createManualTagPlan(repository, input, settings),
          result => `Version ${pc.yellow(result.version)} is valid`,
        )

        await createPlannedTag(repository, plan, settings)
      }),
    )

  cli
    .command('', 'Create the next release tag')
    .alias('bump')
    .option('--level <level>', 'major, minor or patch (default: patch)')
    .option('--channel <channel>', 'release, beta or rc (default: release)')
    .option('--initial <version>', 'Base version when no tag exists')
    .action((parsedOptions: CLIOptions) =>
      handle(async () => {
        console.info(pc.cyan('\n🏷️  semver-tagger\n'))

        let options = restoreRawValues(parsedOptions, argv)
        let cwd = toOptionalString(options.cwd) ?? process.cwd()
        let { config } = await loadConfig(cwd)
        let settings = resolveSettings(options, config)
        let repository = openRepository(settings, cwd)

        let plan = await withSpinner(
          `Reading tags from ${repository.describe()}...`,
          () => planReleaseTag(repository, settings),
          result => `Next version is ${pc.yellow(result.version)}`,
        )

        await createPlannedTag(repository, plan, settings)
      }),
    )

  await handle(async () => {
    cli.parse(argv, { run: false })
    await cli.runMatchedCommand()
  })
}

/**
 * Report a failed command and exit with status 1.
 *
 * @param action - Command body.
 */
async function handle(action: () => Promise<void>): Promise<void> {
  try {
    await action()
  } catch (error) {
    printError(error)
    process.exit(1)
  }
}
