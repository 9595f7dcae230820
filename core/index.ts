export { InvalidTransitionError } from './errors/invalid-transition-error'
export { VersionFieldMissingError } from './errors/version-field-missing-error'
export { ManifestNotFoundError } from './errors/manifest-not-found-error'
export { DirtyWorkingTreeError } from './errors/dirty-working-tree-error'
export { NotARepositoryError } from './errors/not-a-repository-error'
export { PartialUpdateError } from './errors/partial-update-error'
export { InvalidVersionError } from './errors/invalid-version-error'
export { ManifestParseError } from './errors/manifest-parse-error'
export { parseBumpDirective } from './bump/parse-bump-directive'
export { computeNextVersion } from './bump/compute-next-version'
export { validateTransition } from './bump/validate-transition'
export { GitCommandError } from './errors/git-command-error'
export { createGitClient } from './git/create-git-client'
export { compareVersions } from './versions/compare-versions'
export { TagExistsError } from './errors/tag-exists-error'
export { createVersion } from './versions/create-version'
export { renderVersion } from './versions/render-version'
export { isPreRelease } from './versions/is-pre-release'
export { nameArtifacts } from './naming/name-artifacts'
export { parseVersion } from './versions/parse-version'
export { BumpError } from './errors/bump-error'
export { bumpVersion } from './bump/bump-version'
export { updateVersion } from './update-version'

export type { BumpDirective, BumpKeyword } from '../types/bump-directive'
export type { PreRelease, PreReleaseTag } from '../types/pre-release'
export type { BumpErrorCode } from './errors/bump-error'
export type { VersionInfo } from '../types/version-info'
export type { BumpResult } from '../types/bump-result'
export type { GitClient } from '../types/git-client'
export type { GitStatus } from '../types/git-status'
export type { Ordering } from './versions/compare-versions'
export type { Version } from '../types/version'
export type { TagSpec } from '../types/tag-spec'
