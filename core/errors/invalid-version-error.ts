import { BumpError } from './bump-error'

/** A version string is outside the accepted grammar. */
export class InvalidVersionError extends BumpError {
  public readonly input: string

  /**
   * Creates a new InvalidVersionError.
   *
   * @param input - The offending string.
   * @param reason - Optional detail appended to the message.
   */
  public constructor(input: string, reason?: string) {
    super(
      'INVALID_VERSION',
      `Invalid version format: ${input}${reason ? ` (${reason})` : ''}`,
    )
    this.input = input
  }
}
