import { beforeEach, describe, expect, it, vi } from 'vitest'

import { VersionFieldMissingError } from '../../core/errors/version-field-missing-error'
import { ManifestNotFoundError } from '../../core/errors/manifest-not-found-error'
import { readManifest } from '../../core/manifest/read-manifest'

vi.mock(import('node:fs/promises'), () => ({
  readFile: vi.fn(),
}))

describe('readManifest', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('reads pyproject.toml from the directory', async () => {
    let { readFile } = await import('node:fs/promises')
    let content = '[project]\nname = "demo"\nversion = "0.3.0"\n'
    vi.mocked(readFile).mockResolvedValue(content)

    let manifest = await readManifest('/repo')

    expect(readFile).toHaveBeenCalledWith('/repo/pyproject.toml', 'utf8')
    expect(manifest).toEqual({
      path: '/repo/pyproject.toml',
      version: '0.3.0',
      content,
    })
  })

  it('throws ManifestNotFoundError when the file is missing', async () => {
    let { readFile } = await import('node:fs/promises')
    vi.mocked(readFile).mockRejectedValue(
      Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }),
    )

    await expect(readManifest('/repo')).rejects.toThrowError(
      ManifestNotFoundError,
    )
    await expect(readManifest('/repo')).rejects.toThrowError(
      'pyproject.toml not found in /repo',
    )
  })

  it('propagates other read errors', async () => {
    let { readFile } = await import('node:fs/promises')
    vi.mocked(readFile).mockRejectedValue(
      Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }),
    )

    await expect(readManifest('/repo')).rejects.toThrowError(
      'EACCES: permission denied',
    )
  })

  it('throws when project.version is missing', async () => {
    let { readFile } = await import('node:fs/promises')
    vi.mocked(readFile).mockResolvedValue('[project]\nname = "demo"\n')

    await expect(readManifest('/repo')).rejects.toThrowError(
      VersionFieldMissingError,
    )
  })
})
