import { BumpError } from './bump-error'

/** The working directory is outside any git work tree. */
export class NotARepositoryError extends BumpError {
  /**
   * Creates a new NotARepositoryError.
   *
   * @param directory - Directory that was checked.
   */
  public constructor(directory: string) {
    super('NOT_A_REPOSITORY', `Not a git repository: ${directory}`)
  }
}
