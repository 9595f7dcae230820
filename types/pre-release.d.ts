/** Pre-release tag letter, in ascending order of maturity. */
export type PreReleaseTag = 'rc' | 'a' | 'b'

/**
 * Pre-release marker appended to a release triple (e.g. `a1`, `rc2`).
 */
export interface PreRelease {
  /**
   * Tag letter: alpha (`a`), beta (`b`) or release candidate (`rc`).
   */
  readonly tag: PreReleaseTag

  /**
   * Pre-release number following the tag.
   */
  readonly number: number
}
