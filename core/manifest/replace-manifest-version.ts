import type { Manifest } from '../../types/manifest'

import { ManifestParseError } from '../errors/manifest-parse-error'
import { parseManifestVersion } from './parse-manifest-version'
import { BumpError } from '../errors/bump-error'

/** Table header such as `[project]`; array-of-tables headers excluded. */
let tableHeaderPattern = /^\s*\[(?!\[)\s*(?<name>[^\]]+?)\s*\](?:\s*#.*)?\s*$/u

/** Array-of-tables header such as `[[tool.uv.index]]`. */
let arrayTableHeaderPattern = /^\s*\[\[/u

/** `version = "..."` inside `[project]`. */
let versionKeyPattern =
  /^(?<before>\s*version\s*=\s*)(?<quote>["'])(?<value>[^"'\r\n]*)\k<quote>/u

/** `project.version = "..."` at the top level. */
let dottedVersionKeyPattern =
  /^(?<before>\s*project\s*\.\s*version\s*=\s*)(?<quote>["'])(?<value>[^"'\r\n]*)\k<quote>/u

/**
 * Normalize a table name for comparison (`[ "project" ]` is `project`).
 *
 * @param name - Raw table name.
 * @returns Name without quotes or whitespace.
 */
function normalizeTableName(name: string): string {
  return name.replaceAll(/["'\s]/gu, '')
}

/**
 * Check that edited content still parses and holds the expected version.
 *
 * @param path - Manifest path.
 * @param content - Edited TOML source.
 * @param version - Expected version.
 * @returns True when `project.version` reads back as `version`.
 */
function readsBack(path: string, content: string, version: string): boolean {
  try {
    return parseManifestVersion(path, content) === version
  } catch (error) {
    if (error instanceof BumpError) {
      return false
    }
    throw error
  }
}

/**
 * Replace `project.version` in the manifest source, keeping the rest of the
 * file byte for byte: quote style, spacing, comments and line endings.
 *
 * @param manifest - Manifest read from disk.
 * @param version - New version string.
 * @returns Updated file content.
 * @throws {ManifestParseError} When the version key cannot be edited in place
 *   (e.g. multi-line strings or inline tables).
 */
export function replaceManifestVersion(
  manifest: Manifest,
  version: string,
): string {
  let lines = manifest.content.split(/(?<=\n)/u)
  let table: string | null = ''
  let replaced = false

  for (let [index, line] of lines.entries()) {
    if (arrayTableHeaderPattern.test(line)) {
      table = null
      continue
    }

    let header = tableHeaderPattern.exec(line)
    if (header?.groups) {
      table = normalizeTableName(header.groups['name'] ?? '')
      continue
    }

    let pattern: RegExp | null = null
    if (table === 'project') {
      pattern = versionKeyPattern
    } else if (table === '') {
      pattern = dottedVersionKeyPattern
    }

    let match = pattern?.exec(line)
    if (!match?.groups) {
      continue
    }

    let { before = '', quote = '"' } = match.groups
    lines[index] =
      `${before}${quote}${version}${quote}` + line.slice(match[0].length)
    replaced = true
    break
  }

  let updated = lines.join('')
  if (!replaced || !readsBack(manifest.path, updated, version)) {
    throw new ManifestParseError(
      manifest.path,
      'unable to update project.version in place',
    )
  }

  return updated
}
