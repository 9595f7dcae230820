import { BumpError } from './bump-error'

/** The manifest is not valid TOML, or cannot be edited in place. */
export class ManifestParseError extends BumpError {
  public readonly path: string

  /**
   * Creates a new ManifestParseError.
   *
   * @param path - Manifest path.
   * @param detail - What went wrong.
   */
  public constructor(path: string, detail: string) {
    super('MANIFEST_PARSE', `Failed to process ${path}: ${detail}`)
    this.path = path
  }
}
