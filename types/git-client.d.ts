import type { GitStatus } from './git-status'

/**
 * Operations the version update needs from the version-control system.
 * Bound to a single working directory.
 */
export interface GitClient {
  /**
   * Stage the given files and commit them.
   *
   * @param files - Paths to stage.
   * @param message - Commit message.
   */
  commit(files: string[], message: string): void

  /**
   * Create a lightweight tag pointing at HEAD.
   *
   * @param name - Tag name.
   */
  createTag(name: string): void

  /**
   * Check whether a tag already exists.
   *
   * @param name - Tag name.
   */
  hasTag(name: string): boolean

  /** Whether the working directory is inside a git work tree. */
  isRepository(): boolean

  /** Changes to tracked files. */
  getStatus(): GitStatus
}
