import type { SemverTaggerConfig } from '../types/semver-tagger-config'
import type { ReleaseChannel } from '../types/release-channel'
import type { CLIOptions } from '../types/cli-options'
import type { BumpLevel } from '../types/bump-level'

import {
  DEFAULT_INITIAL_VERSION,
  DEFAULT_MESSAGE,
  DEFAULT_PREFIX,
  DEFAULT_REMOTE,
} from '../core/constants'
import { normalizeReleaseChannel } from './normalize-release-channel'
import { normalizeBumpLevel } from './normalize-bump-level'
import { toOptionalString } from './to-optional-string'

/** Effective settings of one run. */
export interface Settings {
  /** Commit or reference to tag, `HEAD` when null. */
  sha: string | null

  /** GitHub repository, local clone when null. */
  repo: string | null

  channel: ReleaseChannel

  requirePrefix: boolean

  level: BumpLevel

  initial: string

  message: string

  dryRun: boolean

  prefix: string

  remote: string

  push: boolean

  yes: boolean
}

/**
 * Merge command-line options over file configuration and built-in defaults.
 *
 * @param options - Parsed command-line options.
 * @param config - Configuration file values.
 * @returns Effective settings.
 */
export function resolveSettings(
  options: CLIOptions,
  config: SemverTaggerConfig,
): Settings {
  return {
    level: normalizeBumpLevel(toOptionalString(options.level), config.level),
    channel: normalizeReleaseChannel(
      toOptionalString(options.channel),
      config.channel,
    ),
    requirePrefix: options.requirePrefix ?? config.requirePrefix ?? false,
    initial:
      toOptionalString(options.initial) ??
      config.initial ??
      DEFAULT_INITIAL_VERSION,
    message:
      toOptionalString(options.message) ?? config.message ?? DEFAULT_MESSAGE,
    prefix: toOptionalString(options.prefix) ?? config.prefix ?? DEFAULT_PREFIX,
    remote: toOptionalString(options.remote) ?? config.remote ?? DEFAULT_REMOTE,
    /* `--no-push` is the only way the flag becomes false. */
    push: options.push === false ? false : (config.push ?? true),
    sha: toOptionalString(options.sha) ?? null,
    repo: toOptionalString(options.repo) ?? config.repo ?? null,
    dryRun: options.dryRun ?? false,
    yes: options.yes ?? false,
  }
}

