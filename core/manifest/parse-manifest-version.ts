import { TomlError, parse } from 'smol-toml'

import { VersionFieldMissingError } from '../errors/version-field-missing-error'
import { ManifestParseError } from '../errors/manifest-parse-error'
import { isTomlTable } from './is-toml-table'

/**
 * Parse manifest content and extract `project.version`.
 *
 * @param path - Manifest path, for error messages.
 * @param content - TOML source.
 * @returns The version string as written.
 * @throws {ManifestParseError} When the content is not valid TOML.
 * @throws {VersionFieldMissingError} When `project.version` is absent or not
 *   a string.
 */
export function parseManifestVersion(path: string, content: string): string {
  let data: unknown
  try {
    data = parse(content)
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ManifestParseError(path, error.message)
    }
    throw error
  }

  if (!isTomlTable(data) || !isTomlTable(data['project'])) {
    throw new VersionFieldMissingError(path)
  }

  let version = data['project']['version']
  if (typeof version !== 'string') {
    throw new VersionFieldMissingError(path)
  }

  return version
}
