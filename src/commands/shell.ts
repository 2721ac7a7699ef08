/**
 * Shell command - Start a shell inside the environment
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the shell command
 */
export async function runShell(options: CommandOptions): Promise<number> {
  if (options.environment.shellEnabled) {
    reporter.printError('You are already in an envbox shell.')
    return 1
  }

  const box = await Environment.open(options.cwd, options.environment)
  reporter.printInfo('Starting an envbox shell...')
  await box.shell()

  return 0
}
