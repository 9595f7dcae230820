import { describe, expect, it } from 'vitest'

import { VersionFieldMissingError } from '../../core/errors/version-field-missing-error'
import { ManifestNotFoundError } from '../../core/errors/manifest-not-found-error'
import { DirtyWorkingTreeError } from '../../core/errors/dirty-working-tree-error'
import { NotARepositoryError } from '../../core/errors/not-a-repository-error'
import { InvalidVersionError } from '../../core/errors/invalid-version-error'
import { PartialUpdateError } from '../../core/errors/partial-update-error'
import { ManifestParseError } from '../../core/errors/manifest-parse-error'
import { GitCommandError } from '../../core/errors/git-command-error'
import { TagExistsError } from '../../core/errors/tag-exists-error'
import { BumpError } from '../../core/errors/bump-error'

describe('bump errors', () => {
  it('names errors after their class', () => {
    let error = new InvalidVersionError('1.0')

    expect(error).toBeInstanceOf(BumpError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('InvalidVersionError')
    expect(error.code).toBe('INVALID_VERSION')
    expect(error.input).toBe('1.0')
  })

  it('builds messages for manifest errors', () => {
    expect(new ManifestNotFoundError('/repo/pyproject.toml').message).toBe(
      'pyproject.toml not found in /repo',
    )
    expect(new VersionFieldMissingError('/repo/pyproject.toml').message).toBe(
      'project.version not found in /repo/pyproject.toml',
    )
    expect(new ManifestParseError('/repo/pyproject.toml', 'bad').code).toBe(
      'MANIFEST_PARSE',
    )
  })

  it('builds messages for git state errors', () => {
    expect(new NotARepositoryError('/tmp').message).toBe(
      'Not a git repository: /tmp',
    )
    expect(new TagExistsError('v1.0.0').message).toBe('Tag v1.0.0 already exists')
    expect(
      new DirtyWorkingTreeError({ unstaged: ['a.py'], staged: [] }).message,
    ).toBe('Repository has unstaged changes')
    expect(
      new DirtyWorkingTreeError({ unstaged: ['a.py'], staged: ['b.py'] })
        .message,
    ).toBe('Repository has staged and unstaged changes')
  })

  it('omits empty git output from the message', () => {
    expect(new GitCommandError(['tag', 'v1'], '  \n').message).toBe(
      'git tag v1 failed',
    )
  })

  it('keeps the cause of a partial update', () => {
    let cause = new GitCommandError(['tag', 'v1.0.1'], 'fatal: bad ref')
    let error = new PartialUpdateError('tag', '/repo/pyproject.toml', cause)

    expect(error.cause).toBe(cause)
    expect(error.code).toBe('PARTIAL_UPDATE')
    expect(error.message).toBe(
      'git tag v1.0.1 failed: fatal: bad ref\n' +
        'The version commit was created but not tagged. ' +
        'Undo it with `git reset --soft HEAD~1` or create the tag manually',
    )
  })
})
