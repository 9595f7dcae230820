import { describe, expect, it } from 'vitest'

import { InvalidVersionError } from '../../core/errors/invalid-version-error'
import { parseVersion } from '../../core/versions/parse-version'

describe('parseVersion', () => {
  it('parses a release triple', () => {
    expect(parseVersion('1.2.3')).toEqual({
      preRelease: null,
      major: 1,
      minor: 2,
      patch: 3,
    })
  })

  it('parses canonical pre-releases', () => {
    expect(parseVersion('1.2.3a4').preRelease).toEqual({ number: 4, tag: 'a' })
    expect(parseVersion('1.2.3b1').preRelease).toEqual({ number: 1, tag: 'b' })
    expect(parseVersion('2.0.0rc1').preRelease).toEqual({
      number: 1,
      tag: 'rc',
    })
  })

  it('normalizes alternate pre-release spellings', () => {
    expect(parseVersion('1.0.0-RC.1').preRelease).toEqual({
      number: 1,
      tag: 'rc',
    })
    expect(parseVersion('1.0.0alpha2').preRelease).toEqual({
      number: 2,
      tag: 'a',
    })
    expect(parseVersion('1.0.0_beta_3').preRelease).toEqual({
      number: 3,
      tag: 'b',
    })
    expect(parseVersion('1.0.0c4').preRelease).toEqual({ number: 4, tag: 'rc' })
    expect(parseVersion('1.0.0pre5').preRelease).toEqual({
      number: 5,
      tag: 'rc',
    })
    expect(parseVersion('1.0.0.preview6').preRelease).toEqual({
      number: 6,
      tag: 'rc',
    })
  })

  it('treats a missing pre-release number as zero', () => {
    expect(parseVersion('1.0.0rc').preRelease).toEqual({ number: 0, tag: 'rc' })
  })

  it('accepts surrounding whitespace and a leading v', () => {
    expect(parseVersion('  v1.2.3\n')).toEqual(parseVersion('1.2.3'))
    expect(parseVersion('V1.2.3')).toEqual(parseVersion('1.2.3'))
  })

  it('drops leading zeros', () => {
    expect(parseVersion('01.002.3a04')).toEqual(parseVersion('1.2.3a4'))
  })

  it('returns frozen values', () => {
    let version = parseVersion('1.2.3a1')

    expect(Object.isFrozen(version)).toBeTruthy()
    expect(Object.isFrozen(version.preRelease)).toBeTruthy()
  })

  it.each([
    '1.0',
    '1',
    '1.0.0.0',
    '1.0.0x1',
    '1.0.0.post1',
    '1.0.0.dev1',
    '1.0.0+local',
    '1!1.0.0',
    '1.0.0rc1rc2',
    'a.b.c',
    '-1.0.0',
    '',
    'latest',
  ])('rejects %j', input => {
    expect(() => parseVersion(input)).toThrowError(InvalidVersionError)
  })

  it('reports the offending string', () => {
    expect(() => parseVersion('1.0.0x1')).toThrowError(
      'Invalid version format: 1.0.0x1',
    )
  })

  it('rejects components beyond the safe integer range', () => {
    expect(() => parseVersion('9007199254740993.0.0')).toThrowError(
      'Invalid version format: 9007199254740993.0.0 (9007199254740993 is too large)',
    )
  })
})
