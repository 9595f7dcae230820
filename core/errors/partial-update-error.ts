import { BumpError } from './bump-error'

/** Step at which a mutation failed after the manifest was written. */
export type FailedStep = 'commit' | 'tag'

/**
 * A git step failed after the manifest was already written. Nothing is
 * reverted automatically; the message names the manual recovery.
 */
export class PartialUpdateError extends BumpError {
  public readonly failedStep: FailedStep

  /**
   * Creates a new PartialUpdateError.
   *
   * @param failedStep - Step that failed.
   * @param manifestPath - Manifest that was already rewritten.
   * @param cause - Underlying failure.
   */
  public constructor(
    failedStep: FailedStep,
    manifestPath: string,
    cause: unknown,
  ) {
    let reason = cause instanceof Error ? cause.message : String(cause)
    let recovery =
      failedStep === 'commit'
        ? `${manifestPath} was updated but not committed. ` +
          `Restore it with \`git checkout -- ${manifestPath}\``
        : 'The version commit was created but not tagged. ' +
          'Undo it with `git reset --soft HEAD~1` or create the tag manually'
    super('PARTIAL_UPDATE', `${reason}\n${recovery}`, { cause })
    this.failedStep = failedStep
  }
}
