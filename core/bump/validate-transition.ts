import type { BumpDirective } from '../../types/bump-directive'
import type { Version } from '../../types/version'

import { InvalidTransitionError } from '../errors/invalid-transition-error'
import { compareVersions } from '../versions/compare-versions'
import { isPreRelease } from '../versions/is-pre-release'

/**
 * Check that moving from one version to another is allowed.
 *
 * Rules, in order:
 *
 * 1. The next version must be strictly greater than the current one.
 * 2. Only an explicit version may enter a pre-release from a normal release.
 *    Leaving a pre-release is also open to `major`, `minor` and `patch`, which
 *    increment the release triple; `bump` must stay on the pre-release.
 *
 * @param current - Version before the change.
 * @param next - Version after the change.
 * @param directive - Directive that produced `next`.
 * @throws {InvalidTransitionError} When a rule is violated.
 */
export function validateTransition(
  current: Version,
  next: Version,
  directive: BumpDirective,
): void {
  if (compareVersions(next, current) <= 0) {
    throw new InvalidTransitionError(current, next, 'monotonicity')
  }

  if (directive.type === 'explicit') {
    return
  }

  let enters = !isPreRelease(current) && isPreRelease(next)
  let leaves = isPreRelease(current) && !isPreRelease(next)
  if (enters || (leaves && directive.type === 'bump')) {
    throw new InvalidTransitionError(current, next, 'pre-release-boundary')
  }
}
