import type { MockInstance } from 'vitest'

import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'

import type { VersionInfo } from '../../types/version-info'

import { printReport } from '../../cli/print-report'

/**
 * Build a report.
 *
 * @param overrides - Fields to change.
 * @returns Version info.
 */
function report(overrides: Partial<VersionInfo> = {}): VersionInfo {
  return {
    path: '/repo/pyproject.toml',
    commitMessage: '1.2.4',
    oldVersion: '1.2.3',
    newVersion: '1.2.4',
    tagName: 'v1.2.4',
    dryRun: false,
    warnings: [],
    ...overrides,
  }
}

describe('printReport', () => {
  let consoleInfoSpy: MockInstance
  let consoleWarnSpy: MockInstance

  beforeEach(() => {
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleInfoSpy.mockRestore()
    consoleWarnSpy.mockRestore()
  })

  it('prints path, versions, commit and tag', () => {
    printReport(report())

    expect(consoleInfoSpy.mock.calls).toEqual([
      ['Updated: /repo/pyproject.toml'],
      ['Version: 1.2.3 → 1.2.4'],
      ['Commit: 1.2.4'],
      ['Tag: v1.2.4'],
    ])
    expect(consoleWarnSpy).not.toHaveBeenCalled()
  })

  it('marks a dry run and prints its warnings', () => {
    printReport(
      report({ warnings: ['Repository has unstaged changes'], dryRun: true }),
    )

    expect(consoleInfoSpy).toHaveBeenCalledWith(
      'Would update: /repo/pyproject.toml',
    )
    expect(consoleInfoSpy).toHaveBeenLastCalledWith(
      '(dry run - no changes made)',
    )
    expect(consoleWarnSpy).toHaveBeenCalledWith(
      '⚠️  Repository has unstaged changes',
    )
  })
})
