import pc from 'picocolors'

import { BumpError } from '../core/errors/bump-error'

/**
 * Prints a fatal error. Expected failures show their message only; anything
 * else is flagged as unexpected.
 *
 * @param error - Thrown value.
 */
export function printError(error: unknown): void {
  let message = error instanceof Error ? error.message : String(error)

  if (error instanceof BumpError) {
    console.error(pc.redBright('Error:'), message)
    return
  }

  if (error instanceof Error && error.name === 'CACError') {
    console.error(pc.redBright('Error:'), message)
    console.error(pc.gray('Run with --help to see available options'))
    return
  }

  console.error(pc.redBright('Unexpected error:'), message)
}
