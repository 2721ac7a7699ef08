/**
 * Exec command - Run a command inside the environment
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the exec command
 */
export async function runExec(options: CommandOptions): Promise<number> {
  if (options.args.length === 0) {
    reporter.printError('Usage: envbox exec <command> [args...]')
    return 1
  }

  const box = await Environment.open(options.cwd, options.environment)
  await box.exec(...options.args)

  return 0
}
