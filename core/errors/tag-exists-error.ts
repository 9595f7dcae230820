import { BumpError } from './bump-error'

/** The tag the run would create already exists. */
export class TagExistsError extends BumpError {
  public readonly tagName: string

  /**
   * Creates a new TagExistsError.
   *
   * @param tagName - Existing tag.
   */
  public constructor(tagName: string) {
    super('TAG_EXISTS', `Tag ${tagName} already exists`)
    this.tagName = tagName
  }
}
