import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import { parseBumpDirective } from '../core/bump/parse-bump-directive'
import { createGitClient } from '../core/git/create-git-client'
import { updateVersion } from '../core/update-version'
import { version } from '../package.json'
import { printReport } from './print-report'
import { printError } from './print-error'

/** CLI Options. */
interface CLIOptions {
  /** Compute and report without changing anything. */
  dryRun?: boolean

  /** Use the `test-` tag prefix. */
  test?: boolean
}

/**
 * Run the CLI.
 *
 * @param argv - Process arguments, including the node binary and script.
 * @param cwd - Project directory.
 */
export async function run(
  argv: string[] = process.argv,
  cwd: string = process.cwd(),
): Promise<void> {
  let cli = cac('pep-bump')

  cli
    .help()
    .version(version)
    .option('-t, --test', 'Use test- prefix for tag instead of v')
    .option('-n, --dry-run', 'Show what would be done without making changes')
    .command(
      '[newversion]',
      'Set the version or bump it (major | minor | patch | bump)',
    )
    .example('pep-bump minor')
    .example('pep-bump 2.0.0rc1 --dry-run')
    .action(async (input: undefined | string, options: CLIOptions) => {
      let directive = parseBumpDirective(input)
      let dryRun = Boolean(options.dryRun)

      if (dryRun) {
        console.info(pc.yellow('\n📋 Dry Run - No changes will be made\n'))
      }

      let spinner = createSpinner(
        dryRun ? 'Computing new version...' : 'Updating version...',
      ).start()

      try {
        let info = await updateVersion({
          git: createGitClient(cwd),
          testMode: Boolean(options.test),
          directive,
          dryRun,
          cwd,
        })

        spinner.success(
          dryRun
            ? `Version would change to ${pc.green(info.newVersion)}`
            : `Released ${pc.green(info.tagName)}`,
        )
        printReport(info)
      } catch (error) {
        spinner.error('Failed')
        throw error
      }
    })

  try {
    cli.parse(argv, { run: false })
    await cli.runMatchedCommand()
  } catch (error) {
    printError(error)
    process.exit(1)
  }
}
