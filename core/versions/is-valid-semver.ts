/**
 * SemVer 2.0.0 grammar, as published at semver.org. Numeric identifiers must
 * not carry leading zeros; pre-release and build identifiers are dot separated
 * alphanumerics and hyphens.
 */
const SEMVER_PATTERN =
  /^(?<major>0|[1-9]\d*)\.(?<minor>0|[1-9]\d*)\.(?<patch>0|[1-9]\d*)(?:-(?<prerelease>(?:0|[1-9]\d*|\d*[A-Za-z-][\dA-Za-z-]*)(?:\.(?:0|[1-9]\d*|\d*[A-Za-z-][\dA-Za-z-]*))*))?(?:\+(?<build>[\dA-Za-z-]+(?:\.[\dA-Za-z-]+)*))?$/u

/**
 * Check whether the value is a semantic version, without prefix or whitespace.
 *
 * @param value - Raw value to validate.
 * @returns True when value matches the SemVer grammar.
 */
export function isValidSemver(value: undefined | string | null): boolean {
  return typeof value === 'string' && SEMVER_PATTERN.test(value)
}
