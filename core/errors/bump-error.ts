/** Stable identifiers for every failure the tool reports. */
export type BumpErrorCode =
  | 'VERSION_FIELD_MISSING'
  | 'INVALID_TRANSITION'
  | 'MANIFEST_NOT_FOUND'
  | 'DIRTY_WORKING_TREE'
  | 'NOT_A_REPOSITORY'
  | 'INVALID_VERSION'
  | 'MANIFEST_PARSE'
  | 'PARTIAL_UPDATE'
  | 'GIT_COMMAND'
  | 'TAG_EXISTS'

/** Base class for expected failures that end a run with a plain message. */
export class BumpError extends Error {
  public readonly code: BumpErrorCode

  /**
   * Creates a new BumpError.
   *
   * @param code - Stable error code.
   * @param message - Human-readable message.
   * @param options - Standard error options, such as the cause.
   */
  public constructor(
    code: BumpErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}
