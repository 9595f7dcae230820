import type { BumpDirective } from '../../types/bump-directive'
import type { Version } from '../../types/version'

import { InvalidVersionError } from '../errors/invalid-version-error'
import { createVersion } from '../versions/create-version'
import { renderVersion } from '../versions/render-version'

/**
 * Add one to a version component.
 *
 * @param current - Version the component belongs to, for error reporting.
 * @param value - Component to increment.
 * @returns Incremented component.
 * @throws {InvalidVersionError} When the result is not a safe integer.
 */
function increment(current: Version, value: number): number {
  let next = value + 1
  if (!Number.isSafeInteger(next)) {
    throw new InvalidVersionError(
      renderVersion(current),
      `${value} cannot be incremented`,
    )
  }
  return next
}

/**
 * Compute the version a directive leads to, without validating it.
 *
 * - `major`, `minor` and `patch` increment the release triple and drop any
 *   pre-release marker, so `1.2.3a1` with `minor` gives `1.3.0`.
 * - `bump` acts as `patch` for a normal release and increments the
 *   pre-release number of a pre-release (`1.2.3a4` gives `1.2.3a5`).
 * - `explicit` returns its version unchanged.
 *
 * @param current - Current version.
 * @param directive - Bump directive.
 * @returns Next version.
 * @throws {InvalidVersionError} When a component would exceed the safe
 *   integer range.
 */
export function computeNextVersion(
  current: Version,
  directive: BumpDirective,
): Version {
  let { major, minor, patch, preRelease } = current

  switch (directive.type) {
    case 'explicit':
      return directive.version
    case 'major':
      return createVersion({
        major: increment(current, major),
        minor: 0,
        patch: 0,
      })
    case 'minor':
      return createVersion({
        minor: increment(current, minor),
        patch: 0,
        major,
      })
    case 'patch':
      return createVersion({ patch: increment(current, patch), major, minor })
    case 'bump':
      if (preRelease) {
        return createVersion({
          preRelease: {
            number: increment(current, preRelease.number),
            tag: preRelease.tag,
          },
          major,
          minor,
          patch,
        })
      }
      return createVersion({ patch: increment(current, patch), major, minor })
  }
}
