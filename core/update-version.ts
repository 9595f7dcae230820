import type { BumpDirective } from '../types/bump-directive'
import type { VersionInfo } from '../types/version-info'
import type { GitClient } from '../types/git-client'

import { replaceManifestVersion } from './manifest/replace-manifest-version'
import { DirtyWorkingTreeError } from './errors/dirty-working-tree-error'
import { NotARepositoryError } from './errors/not-a-repository-error'
import { PartialUpdateError } from './errors/partial-update-error'
import { TagExistsError } from './errors/tag-exists-error'
import { nameArtifacts } from './naming/name-artifacts'
import { renderVersion } from './versions/render-version'
import { writeManifest } from './manifest/write-manifest'
import { parseVersion } from './versions/parse-version'
import { readManifest } from './manifest/read-manifest'
import { bumpVersion } from './bump/bump-version'

/** Options for a version update. */
interface UpdateVersionOptions {
  /**
   * How to derive the next version.
   */
  directive: BumpDirective

  /**
   * Force the `test-` tag prefix.
   */
  testMode: boolean

  /**
   * Compute and report only: no write, commit or tag.
   */
  dryRun: boolean

  /**
   * Git client bound to the project directory.
   */
  git: GitClient

  /**
   * Project directory holding `pyproject.toml`.
   */
  cwd: string
}

/**
 * Update the project version, then commit and tag the change.
 *
 * Every check runs before the first mutation. The mutations run in a fixed
 * order (write manifest, commit, tag) and are never rolled back; a failure
 * after the write is reported as a PartialUpdateError.
 *
 * In a dry run a dirty working tree or an existing tag becomes a warning in
 * the returned report instead of an error.
 *
 * @example
 *   const info = await updateVersion({
 *     directive: { type: 'minor' },
 *     git: createGitClient(cwd),
 *     testMode: false,
 *     dryRun: false,
 *     cwd,
 *   })
 *
 * @param options - Update options.
 * @returns Report of the update.
 */
export async function updateVersion(
  options: UpdateVersionOptions,
): Promise<VersionInfo> {
  let { directive, testMode, dryRun, git, cwd } = options
  let warnings: string[] = []

  let manifest = await readManifest(cwd)
  let result = bumpVersion(parseVersion(manifest.version), directive)
  let { commitMessage, tagName } = nameArtifacts(result, testMode)
  let newVersion = renderVersion(result.next)

  if (!git.isRepository()) {
    throw new NotARepositoryError(cwd)
  }

  let status = git.getStatus()
  if (status.staged.length > 0 || status.unstaged.length > 0) {
    let error = new DirtyWorkingTreeError(status)
    if (!dryRun) {
      throw error
    }
    warnings.push(error.message)
  }

  if (git.hasTag(tagName)) {
    let error = new TagExistsError(tagName)
    if (!dryRun) {
      throw error
    }
    warnings.push(error.message)
  }

  let content = replaceManifestVersion(manifest, newVersion)

  if (!dryRun) {
    await writeManifest(manifest.path, content)

    try {
      git.commit([manifest.path], commitMessage)
    } catch (error) {
      throw new PartialUpdateError('commit', manifest.path, error)
    }

    try {
      git.createTag(tagName)
    } catch (error) {
      throw new PartialUpdateError('tag', manifest.path, error)
    }
  }

  return {
    oldVersion: manifest.version,
    path: manifest.path,
    commitMessage,
    newVersion,
    warnings,
    tagName,
    dryRun,
  }
}
