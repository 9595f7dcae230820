import type { Version } from './version'

/** Outcome of a successful bump. */
export interface BumpResult {
  /** Version read from the manifest. */
  current: Version

  /** Version that replaces it. */
  next: Version
}
