import type { BumpDirective } from '../../types/bump-directive'
import type { BumpResult } from '../../types/bump-result'
import type { Version } from '../../types/version'

import { computeNextVersion } from './compute-next-version'
import { validateTransition } from './validate-transition'

/**
 * Apply a bump directive to the current version.
 *
 * Keyword directives never enter a pre-release; an explicit version is
 * needed for that. `major`, `minor` and `patch` on a pre-release drop the
 * marker, so `1.2.3a1` with `minor` gives `1.3.0`.
 *
 * @param current - Current version.
 * @param directive - Bump directive.
 * @returns Current and next version.
 * @throws {InvalidTransitionError} When the resulting transition is not
 *   allowed.
 */
export function bumpVersion(
  current: Version,
  directive: BumpDirective,
): BumpResult {
  let next = computeNextVersion(current, directive)
  validateTransition(current, next, directive)
  return { current, next }
}
