import type { PreRelease } from '../../types/pre-release'
import type { Version } from '../../types/version'

/**
 * Check whether a value is usable as a version component.
 *
 * @param value - Candidate component.
 * @returns True for non-negative safe integers.
 */
function isComponent(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

/**
 * Build an immutable Version from its parts.
 *
 * @param parts - Release triple and optional pre-release marker.
 * @returns Frozen Version.
 * @throws {RangeError} When a component is negative or not a safe integer.
 */
export function createVersion(parts: {
  preRelease?: PreRelease | null
  major: number
  minor: number
  patch: number
}): Version {
  let { preRelease = null, major, minor, patch } = parts

  for (let component of [major, minor, patch]) {
    if (!isComponent(component)) {
      throw new RangeError(`Invalid version component: ${component}`)
    }
  }

  if (preRelease && !isComponent(preRelease.number)) {
    throw new RangeError(`Invalid pre-release number: ${preRelease.number}`)
  }

  return Object.freeze({
    preRelease: preRelease
      ? Object.freeze({ number: preRelease.number, tag: preRelease.tag })
      : null,
    major,
    minor,
    patch,
  })
}
