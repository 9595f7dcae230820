import pc from 'picocolors'

import type { VersionInfo } from '../types/version-info'

/**
 * Prints the result of a version update.
 *
 * @param info - Update report.
 */
export function printReport(info: VersionInfo): void {
  let label = info.dryRun ? 'Would update' : 'Updated'

  console.info(`${label}: ${pc.cyan(info.path)}`)
  console.info(
    `Version: ${pc.redBright(info.oldVersion)} → ${pc.green(info.newVersion)}`,
  )
  console.info(`Commit: ${info.commitMessage}`)
  console.info(`Tag: ${pc.yellow(info.tagName)}`)

  for (let warning of info.warnings) {
    console.warn(pc.yellow(`⚠️  ${warning}`))
  }

  if (info.dryRun) {
    console.info(pc.gray('(dry run - no changes made)'))
  }
}
