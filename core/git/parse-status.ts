import type { GitStatus } from '../../types/git-status'

/**
 * Parse `git status --porcelain --untracked-files=no` output.
 *
 * Each line is `XY path`, where `X` is the index status and `Y` the working
 * tree status. Renames read `XY old -> new`; the new path is kept.
 *
 * @param output - Porcelain v1 output.
 * @returns Staged and unstaged paths.
 */
export function parseStatus(output: string): GitStatus {
  let status: GitStatus = { unstaged: [], staged: [] }

  for (let line of output.split(/\r?\n/u)) {
    if (line.length < 4) {
      continue
    }

    let indexStatus = line[0]
    let workTreeStatus = line[1]
    let path = line.slice(3)
    let arrow = path.indexOf(' -> ')
    if (arrow !== -1) {
      path = path.slice(arrow + 4)
    }

    /** Untracked and ignored entries carry no tracked change. */
    if (indexStatus === '?' || indexStatus === '!') {
      continue
    }

    if (indexStatus !== ' ') {
      status.staged.push(path)
    }
    if (workTreeStatus !== ' ') {
      status.unstaged.push(path)
    }
  }

  return status
}
