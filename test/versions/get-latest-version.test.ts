import { describe, expect, it } from 'vitest'

import type { TagInfo } from '../../types/tag-info'

import { getLatestVersion } from '../../core/versions/get-latest-version'

function tags(...names: string[]): TagInfo[] {
  return names.map(tag => ({ sha: null, tag }))
}

describe('getLatestVersion', () => {
  let mixed = tags(
    'v1.0.0',
    'v1.10.0',
    'v1.9.0',
    'v2.0.0-beta.1',
    'release',
    '1.5.0',
    'v1.2',
  )

  it('returns null for no tags', () => {
    expect(getLatestVersion([], { prefix: 'v' })).toBeNull()
  })

  it('compares by precedence, not by name', () => {
    expect(getLatestVersion(mixed, { prefix: 'v' })).toBe('1.10.0')
  })

  it('includes pre-releases on request', () => {
    expect(
      getLatestVersion(mixed, { includePrerelease: true, prefix: 'v' }),
    ).toBe('2.0.0-beta.1')
  })

  it('only considers tags carrying the prefix', () => {
    expect(getLatestVersion(mixed, { prefix: '' })).toBe('1.5.0')
    expect(getLatestVersion(mixed, { prefix: 'release-' })).toBeNull()
  })

  it('returns null when only pre-releases exist', () => {
    expect(
      getLatestVersion(tags('v1.0.0-rc.1', 'v1.0.0-rc.2'), { prefix: 'v' }),
    ).toBeNull()
  })

  it('skips versions semver cannot represent', () => {
    expect(
      getLatestVersion(tags('v1.0.0', 'v99999999999999999999.0.0'), {
        prefix: 'v',
      }),
    ).toBe('1.0.0')
  })

  it('ignores build metadata when ordering', () => {
    expect(
      getLatestVersion(tags('v1.0.0+a', 'v1.0.0+b'), { prefix: 'v' }),
    ).toBe('1.0.0+a')
    expect(
      getLatestVersion(tags('v1.0.0+b', 'v1.0.0+a'), { prefix: 'v' }),
    ).toBe('1.0.0+b')
    expect(
      getLatestVersion(tags('v1.0.0+z', 'v1.0.1'), { prefix: 'v' }),
    ).toBe('1.0.1')
  })
})
