/**
 * Report of a version update, printed by the CLI.
 */
export interface VersionInfo {
  /**
   * Non-fatal problems found during a dry run (dirty tree, existing tag).
   */
  warnings: string[]

  /**
   * Commit message used (or that would be used).
   */
  commitMessage: string

  /**
   * Version as previously written in the manifest.
   */
  oldVersion: string

  /**
   * Canonical new version.
   */
  newVersion: string

  /**
   * Whether nothing was written, committed or tagged.
   */
  dryRun: boolean

  /**
   * Tag created (or that would be created).
   */
  tagName: string

  /**
   * Absolute path to the manifest.
   */
  path: string
}
