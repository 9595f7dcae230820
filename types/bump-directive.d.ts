import type { Version } from './version'

/** Keyword directives that compute the next version. */
export type BumpKeyword = 'major' | 'minor' | 'patch' | 'bump'

/**
 * Strategy selected on the command line for deriving the next version.
 */
export type BumpDirective =
  | {
      /** Use the given version as-is. */
      type: 'explicit'

      /** Version to switch to. */
      version: Version
    }
  | {
      type: BumpKeyword
    }
