/**
 * A `pyproject.toml` file read from disk.
 */
export interface Manifest {
  /**
   * Raw file content, kept to rewrite the version in place.
   */
  content: string

  /**
   * Value of `project.version` as written in the file.
   */
  version: string

  /**
   * Absolute path to the manifest.
   */
  path: string
}
