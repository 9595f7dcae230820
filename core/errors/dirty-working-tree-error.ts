import type { GitStatus } from '../../types/git-status'

import { BumpError } from './bump-error'

/**
 * Builds the message for a dirty working tree.
 *
 * @param status - Tracked changes.
 * @returns Message naming the kind of changes found.
 */
function describeStatus(status: GitStatus): string {
  let kinds: string[] = []
  if (status.staged.length > 0) {
    kinds.push('staged')
  }
  if (status.unstaged.length > 0) {
    kinds.push('unstaged')
  }
  return `Repository has ${kinds.join(' and ')} changes`
}

/** Tracked files have staged or unstaged changes. */
export class DirtyWorkingTreeError extends BumpError {
  public readonly status: GitStatus

  /**
   * Creates a new DirtyWorkingTreeError.
   *
   * @param status - Changes found in the working tree.
   */
  public constructor(status: GitStatus) {
    super('DIRTY_WORKING_TREE', describeStatus(status))
    this.status = status
  }
}
