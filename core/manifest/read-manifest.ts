import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import type { Manifest } from '../../types/manifest'

import { ManifestNotFoundError } from '../errors/manifest-not-found-error'
import { parseManifestVersion } from './parse-manifest-version'
import { MANIFEST_FILE_NAME } from '../constants'

/**
 * Read `pyproject.toml` from a directory.
 *
 * @param directory - Absolute project directory.
 * @returns Manifest path, raw content and current version.
 * @throws {ManifestNotFoundError} When the file does not exist.
 */
export async function readManifest(directory: string): Promise<Manifest> {
  let path = join(directory, MANIFEST_FILE_NAME)

  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    ) {
      throw new ManifestNotFoundError(path)
    }
    throw error
  }

  return {
    version: parseManifestVersion(path, content),
    content,
    path,
  }
}
