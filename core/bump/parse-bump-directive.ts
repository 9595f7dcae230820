import type { BumpDirective, BumpKeyword } from '../../types/bump-directive'

import { parseVersion } from '../versions/parse-version'

let keywords = new Set<string>(['major', 'minor', 'patch', 'bump'])

/**
 * Check whether the input names a keyword directive.
 *
 * @param value - Raw input.
 * @returns True for `major`, `minor`, `patch` and `bump`.
 */
function isBumpKeyword(value: string): value is BumpKeyword {
  return keywords.has(value)
}

/**
 * Turn the positional command-line argument into a bump directive.
 *
 * @param input - Keyword or version string. Missing input means `bump`.
 * @returns Bump directive.
 * @throws {InvalidVersionError} When the input is neither a keyword nor a
 *   valid version.
 */
export function parseBumpDirective(input: undefined | string): BumpDirective {
  if (input === undefined || input.trim() === '') {
    return { type: 'bump' }
  }

  let value = input.trim()
  if (isBumpKeyword(value)) {
    return { type: value }
  }

  return { version: parseVersion(value), type: 'explicit' }
}
