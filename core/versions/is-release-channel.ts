import type { ReleaseChannel } from '../../types/release-channel'

/** Accepted release channels. */
export const RELEASE_CHANNELS: readonly ReleaseChannel[] = [
  'release',
  'beta',
  'rc',
]

/**
 * @param value - Value to check.
 * @returns True when value is a release channel.
 */
export function isReleaseChannel(value: unknown): value is ReleaseChannel {
  return RELEASE_CHANNELS.some(channel => channel === value)
}
