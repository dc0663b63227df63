import type { ReleaseChannel } from '../types/release-channel'

import {
  RELEASE_CHANNELS,
  isReleaseChannel,
} from '../core/versions/is-release-channel'
import { ConfigError } from '../core/errors/config-error'

/**
 * Normalizes the release channel option.
 *
 * @param channel - Raw option value.
 * @param fallback - Channel used when the option is absent.
 * @returns Normalized release channel.
 */
export function normalizeReleaseChannel(
  channel: undefined | string,
  fallback: ReleaseChannel = 'release',
): ReleaseChannel {
  let normalized = (channel ?? fallback).toLowerCase()
  if (isReleaseChannel(normalized)) {
    return normalized
  }
  throw new ConfigError(
    `Invalid channel "${channel}". Expected ${RELEASE_CHANNELS.map(
      value => `"${value}"`,
    ).join(', ')}.`,
  )
}
