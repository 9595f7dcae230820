import { dirname } from 'node:path'

import { BumpError } from './bump-error'

/** No manifest at the expected location. */
export class ManifestNotFoundError extends BumpError {
  public readonly path: string

  /**
   * Creates a new ManifestNotFoundError.
   *
   * @param path - Path where the manifest was expected.
   */
  public constructor(path: string) {
    super('MANIFEST_NOT_FOUND', `pyproject.toml not found in ${dirname(path)}`)
    this.path = path
  }
}
