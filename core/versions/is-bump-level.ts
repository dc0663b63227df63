import type { BumpLevel } from '../../types/bump-level'

/** Accepted bump levels, in order of significance. */
export const BUMP_LEVELS: readonly BumpLevel[] = ['major', 'minor', 'patch']

/**
 * @param value - Value to check.
 * @returns True when value is a bump level.
 */
export function isBumpLevel(value: unknown): value is BumpLevel {
  return BUMP_LEVELS.some(level => level === value)
}
