import { describe, expect, it } from 'vitest'

import {
  RELEASE_CHANNELS,
  isReleaseChannel,
} from '../../core/versions/is-release-channel'

describe('isReleaseChannel', () => {
  it('accepts every channel', () => {
    expect(RELEASE_CHANNELS).toEqual(['release', 'beta', 'rc'])
    for (let channel of RELEASE_CHANNELS) {
      expect(isReleaseChannel(channel)).toBeTruthy()
    }
  })

  it('rejects other values', () => {
    expect(isReleaseChannel('alpha')).toBeFalsy()
    expect(isReleaseChannel(undefined)).toBeFalsy()
  })
})
