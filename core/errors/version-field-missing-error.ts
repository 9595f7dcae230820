import { BumpError } from './bump-error'

/** The manifest has no string `project.version`. */
export class VersionFieldMissingError extends BumpError {
  public readonly path: string

  /**
   * Creates a new VersionFieldMissingError.
   *
   * @param path - Manifest path.
   */
  public constructor(path: string) {
    super('VERSION_FIELD_MISSING', `project.version not found in ${path}`)
    this.path = path
  }
}
