import { BumpError } from './bump-error'

/** A git invocation exited with an error. */
export class GitCommandError extends BumpError {
  public readonly args: string[]
  public readonly stderr: string

  /**
   * Creates a new GitCommandError.
   *
   * @param args - Arguments passed to git.
   * @param stderr - Error output of the command.
   */
  public constructor(args: string[], stderr: string) {
    let detail = stderr.trim()
    super(
      'GIT_COMMAND',
      `git ${args.join(' ')} failed${detail ? `: ${detail}` : ''}`,
    )
    this.stderr = stderr
    this.args = args
  }
}
