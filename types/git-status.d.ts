/**
 * Changes to tracked files, as reported by `git status`. Untracked and
 * ignored files are not listed.
 */
export interface GitStatus {
  /** Paths with changes not yet added to the index. */
  unstaged: string[]

  /** Paths with changes added to the index. */
  staged: string[]
}
