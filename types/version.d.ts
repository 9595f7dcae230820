import type { PreRelease } from './pre-release'

/**
 * Parsed release identifier: a release triple with an optional pre-release
 * marker. Values are immutable; transitions always produce a new Version.
 */
export interface Version {
  /**
   * Pre-release marker, or null for a normal release.
   */
  readonly preRelease: PreRelease | null

  /**
   * Major release component.
   */
  readonly major: number

  /**
   * Minor release component.
   */
  readonly minor: number

  /**
   * Patch release component.
   */
  readonly patch: number
}
