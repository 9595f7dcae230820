import { execFileSync } from 'node:child_process'

import type { GitClient } from '../../types/git-client'

import { GitCommandError } from '../errors/git-command-error'
import { parseStatus } from './parse-status'

/**
 * Extract stderr from an `execFileSync` failure.
 *
 * @param error - Thrown value.
 * @returns Error output, or the error message when none was captured.
 */
function readStderr(error: unknown): string {
  if (error instanceof Error) {
    if ('stderr' in error) {
      let { stderr } = error
      if (typeof stderr === 'string' && stderr.trim() !== '') {
        return stderr
      }
      if (Buffer.isBuffer(stderr) && stderr.length > 0) {
        return stderr.toString('utf8')
      }
    }
    return error.message
  }
  return String(error)
}

/**
 * Create a GitClient that runs the `git` executable in a directory.
 *
 * @param cwd - Working directory every command runs in.
 * @returns Git client bound to `cwd`.
 */
export function createGitClient(cwd: string): GitClient {
  function git(args: string[]): string {
    try {
      return execFileSync('git', args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        encoding: 'utf8',
        cwd,
      })
    } catch (error) {
      throw new GitCommandError(args, readStderr(error))
    }
  }

  return {
    isRepository() {
      try {
        return git(['rev-parse', '--is-inside-work-tree']).trim() === 'true'
      } catch (error) {
        if (error instanceof GitCommandError) {
          return false
        }
        throw error
      }
    },
    hasTag(name) {
      try {
        git(['rev-parse', '--verify', '--quiet', `refs/tags/${name}`])
        return true
      } catch (error) {
        if (error instanceof GitCommandError) {
          return false
        }
        throw error
      }
    },
    commit(files, message) {
      git(['add', '--', ...files])
      git(['commit', '--message', message, '--', ...files])
    },
    getStatus() {
      return parseStatus(
        git(['status', '--porcelain', '--untracked-files=no']),
      )
    },
    createTag(name) {
      git(['tag', name])
    },
  }
}
