/**
 * Release channel. `beta` and `rc` produce pre-release versions
 * (`1.2.0-beta.1`), `release` produces a stable one.
 */
export type ReleaseChannel = 'release' | 'beta' | 'rc'
