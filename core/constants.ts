/** Prefix prepended to versions to form tag names. */
export const DEFAULT_PREFIX = 'v'

/** Base version used when a repository has no release tags yet. */
export const DEFAULT_INITIAL_VERSION = '0.1.0'

/** Remote local tags are pushed to. */
export const DEFAULT_REMOTE = 'origin'

/** Annotation message template. */
export const DEFAULT_MESSAGE = 'Release {tag}'

/** Reference tagged when no SHA is given. */
export const DEFAULT_REFERENCE = 'HEAD'

/** Configuration file names looked up in the working directory, in order. */
export const CONFIG_FILE_NAMES = ['.semver-tagger.yml', '.semver-tagger.yaml']

/** GitHub REST API base URL. */
export const GITHUB_API_URL = 'https://api.github.com'
