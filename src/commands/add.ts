/**
 * Add command - Declare and install packages
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the add command
 */
export async function runAdd(options: CommandOptions): Promise<number> {
  if (options.args.length === 0) {
    reporter.printError('Usage: envbox add <pkg>...')
    return 1
  }

  const box = await Environment.open(options.cwd, options.environment)
  const result = await box.add(...options.args)

  if (!result.installed) {
    reporter.printInfo('All packages were already declared; nothing to install.')
  }

  return 0
}
