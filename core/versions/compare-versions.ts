import type { PreReleaseTag } from '../../types/pre-release'
import type { Version } from '../../types/version'

/** Result of comparing two versions. */
export type Ordering = -1 | 0 | 1

let tagRanks: Record<PreReleaseTag, number> = {
  rc: 2,
  a: 0,
  b: 1,
}

/**
 * Compare two numbers.
 *
 * @param left - First number.
 * @param right - Second number.
 * @returns Ordering of the two.
 */
function compareNumbers(left: number, right: number): Ordering {
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

/**
 * Compare two versions.
 *
 * Release triples are compared first. For the same triple a normal release
 * sorts after any pre-release, so `1.0.0 > 1.0.0rc1 > 1.0.0b1 > 1.0.0a1`.
 * Pre-releases compare by tag (`a < b < rc`), then by number.
 *
 * @param a - First version.
 * @param b - Second version.
 * @returns -1 if `a` precedes `b`, 1 if it follows, 0 if equal.
 */
export function compareVersions(a: Version, b: Version): Ordering {
  let release =
    compareNumbers(a.major, b.major) ||
    compareNumbers(a.minor, b.minor) ||
    compareNumbers(a.patch, b.patch)
  if (release !== 0) {
    return release
  }

  if (!a.preRelease || !b.preRelease) {
    if (a.preRelease) {
      return -1
    }
    return b.preRelease ? 1 : 0
  }

  return (
    compareNumbers(tagRanks[a.preRelease.tag], tagRanks[b.preRelease.tag]) ||
    compareNumbers(a.preRelease.number, b.preRelease.number)
  )
}
