/** Git artifacts derived from a new version. */
export interface TagSpec {
  /** Commit message (the canonical version string). */
  commitMessage: string

  /** Tag name: `v<version>` or `test-<version>`. */
  tagName: string
}
