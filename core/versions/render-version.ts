import type { Version } from '../../types/version'

/**
 * Render a version in canonical form.
 *
 * @param version - Version to render.
 * @returns `MAJOR.MINOR.PATCH`, followed by the pre-release tag and number
 *   when present.
 */
export function renderVersion(version: Version): string {
  let release = `${version.major}.${version.minor}.${version.patch}`
  if (!version.preRelease) {
    return release
  }
  return `${release}${version.preRelease.tag}${version.preRelease.number}`
}
