import type { PreReleaseTag } from '../../types/pre-release'
import type { Version } from '../../types/version'

import { InvalidVersionError } from '../errors/invalid-version-error'
import { createVersion } from './create-version'

/**
 * Pre-release spellings accepted by PEP 440 and the tag each normalizes to.
 */
let preReleaseSpellings: Record<string, PreReleaseTag> = {
  preview: 'rc',
  alpha: 'a',
  beta: 'b',
  pre: 'rc',
  rc: 'rc',
  a: 'a',
  b: 'b',
  c: 'rc',
}

/**
 * Release triple, then an optional pre-release tag with optional separators
 * and an optional number.
 */
let versionPattern =
  /^v?(?<major>\d+)\.(?<minor>\d+)\.(?<patch>\d+)(?:[-._]?(?<tag>alpha|beta|preview|pre|rc|a|b|c)[-._]?(?<number>\d+)?)?$/u

/**
 * Convert a digit string to a safe integer.
 *
 * @param input - Whole version string, for error reporting.
 * @param digits - Digits matched by the grammar.
 * @returns Parsed integer.
 */
function toInteger(input: string, digits: string): number {
  let value = Number.parseInt(digits, 10)
  if (!Number.isSafeInteger(value)) {
    throw new InvalidVersionError(input, `${digits} is too large`)
  }
  return value
}

/**
 * Parse a version string into a Version.
 *
 * Canonical form is `MAJOR.MINOR.PATCH` optionally followed by `a`, `b` or
 * `rc` and a number (`1.2.3`, `1.2.3a4`, `2.0.0rc1`). The PEP 440 alternate
 * spellings normalize to it:
 *
 * - Surrounding whitespace and a leading `v` are dropped.
 * - Matching is case-insensitive.
 * - `alpha`, `beta`, `c`, `pre` and `preview` map to `a`, `b` and `rc`.
 * - `.`, `-` or `_` may separate the tag from the release and the number.
 * - A missing pre-release number means `0`.
 *
 * @example
 *   parseVersion('1.0.0-RC.1') // 1.0.0rc1
 *
 * @param text - Version string.
 * @returns Parsed version.
 * @throws {InvalidVersionError} When the string is outside the grammar.
 */
export function parseVersion(text: string): Version {
  let match = versionPattern.exec(text.trim().toLowerCase())
  if (!match?.groups) {
    throw new InvalidVersionError(text)
  }

  let { number, major, minor, patch, tag } = match.groups
  if (major === undefined || minor === undefined || patch === undefined) {
    throw new InvalidVersionError(text)
  }

  let preReleaseTag = tag === undefined ? undefined : preReleaseSpellings[tag]

  return createVersion({
    preRelease: preReleaseTag
      ? {
          number: number === undefined ? 0 : toInteger(text, number),
          tag: preReleaseTag,
        }
      : null,
    major: toInteger(text, major),
    minor: toInteger(text, minor),
    patch: toInteger(text, patch),
  })
}
