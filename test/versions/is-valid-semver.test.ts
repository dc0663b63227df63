import { describe, expect, it } from 'vitest'

import { isValidSemver } from '../../core/versions/is-valid-semver'

describe('isValidSemver', () => {
  it('returns false for nullish values', () => {
    expect(isValidSemver(null)).toBeFalsy()
    expect(isValidSemver(undefined)).toBeFalsy()
    expect(isValidSemver('')).toBeFalsy()
  })

  it('accepts plain versions', () => {
    expect(isValidSemver('0.0.0')).toBeTruthy()
    expect(isValidSemver('1.2.3')).toBeTruthy()
    expect(isValidSemver('10.20.30')).toBeTruthy()
  })

  it('accepts pre-release and build metadata', () => {
    expect(isValidSemver('1.0.0-alpha')).toBeTruthy()
    expect(isValidSemver('1.0.0-alpha.1')).toBeTruthy()
    expect(isValidSemver('1.0.0-0.3.7')).toBeTruthy()
    expect(isValidSemver('1.0.0-x.7.z.92')).toBeTruthy()
    expect(isValidSemver('1.0.0+20130313144700')).toBeTruthy()
    expect(isValidSemver('1.0.0-beta+exp.sha.5114f85')).toBeTruthy()
    expect(isValidSemver('1.0.0+001')).toBeTruthy()
  })

  it('rejects prefixes and surrounding whitespace', () => {
    expect(isValidSemver('v1.2.3')).toBeFalsy()
    expect(isValidSemver(' 1.2.3')).toBeFalsy()
    expect(isValidSemver('1.2.3\n')).toBeFalsy()
  })

  it('rejects incomplete or extra components', () => {
    expect(isValidSemver('1')).toBeFalsy()
    expect(isValidSemver('1.2')).toBeFalsy()
    expect(isValidSemver('1.2.3.4')).toBeFalsy()
  })

  it('rejects leading zeros in numeric identifiers', () => {
    expect(isValidSemver('01.2.3')).toBeFalsy()
    expect(isValidSemver('1.02.3')).toBeFalsy()
    expect(isValidSemver('1.2.03')).toBeFalsy()
    expect(isValidSemver('1.2.3-01')).toBeFalsy()
  })

  it('rejects empty identifiers', () => {
    expect(isValidSemver('1.2.3-')).toBeFalsy()
    expect(isValidSemver('1.2.3+')).toBeFalsy()
    expect(isValidSemver('1.2.3-alpha..1')).toBeFalsy()
    expect(isValidSemver('1.2.3-alpha_1')).toBeFalsy()
  })
})
