import type { Version } from '../../types/version'

/**
 * Check whether a version carries a pre-release marker.
 *
 * @param version - Version to check.
 * @returns True for pre-releases.
 */
export function isPreRelease(version: Version): boolean {
  return version.preRelease !== null
}
