import type { BumpLevel } from '../types/bump-level'

import { BUMP_LEVELS, isBumpLevel } from '../core/versions/is-bump-level'
import { ConfigError } from '../core/errors/config-error'

/**
 * Normalizes the bump level option.
 *
 * @param level - Raw option value.
 * @param fallback - Level used when the option is absent.
 * @returns Normalized bump level.
 */
export function normalizeBumpLevel(
  level: undefined | string,
  fallback: BumpLevel = 'patch',
): BumpLevel {
  let normalized = (level ?? fallback).toLowerCase()
  if (isBumpLevel(normalized)) {
    return normalized
  }
  throw new ConfigError(
    `Invalid level "${level}". Expected ${BUMP_LEVELS.map(
      value => `"${value}"`,
    ).join(', ')}.`,
  )
}
