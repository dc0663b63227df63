export type { VersionParseOptions } from '../types/version-parse-options'
export type { SemverTaggerConfig } from '../types/semver-tagger-config'
export type { GitHubClient, CreateTagParameters } from '../types/github-client'
export type { ReleaseChannel } from '../types/release-channel'
export type { ParsedVersion } from '../types/parsed-version'
export type { BumpLevel } from '../types/bump-level'
export type { TagSource } from '../types/tag-source'
export type { TagTarget } from '../types/tag-target'
export type { TagInfo } from '../types/tag-info'
export type { TagPlan } from '../types/tag-plan'

export { generateNextVersion } from './versions/generate-next-version'
export { createGitHubRepository } from './api/create-github-repository'
export { createLocalRepository } from './git/create-local-repository'
export { createManualTagPlan } from './release/create-manual-tag-plan'
export { GitHubRateLimitError } from './errors/github-rate-limit-error'
export { writeActionOutputs } from './actions/write-action-outputs'
export { InvalidVersionError } from './errors/invalid-version-error'
export { getLatestVersion } from './versions/get-latest-version'
export { createGitHubClient } from './api/create-github-client'
export { MissingTokenError } from './errors/missing-token-error'
export { GitCommandError } from './errors/git-command-error'
export { planReleaseTag } from './release/plan-release-tag'
export { parseRepository } from './parsing/parse-repository'
export { GitHubApiError } from './errors/github-api-error'
export { isValidSemver } from './versions/is-valid-semver'
export { TagExistsError } from './errors/tag-exists-error'
export { TagPushError } from './errors/tag-push-error'
export { applyTagPlan } from './release/apply-tag-plan'
export { parseVersion } from './versions/parse-version'
export { ConfigError } from './errors/config-error'
export { loadConfig } from './config/load-config'
export { formatTag } from './versions/format-tag'
