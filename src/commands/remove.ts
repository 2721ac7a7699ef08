/**
 * Remove command - Drop packages from the environment
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the remove command
 */
export async function runRemove(options: CommandOptions): Promise<number> {
  if (options.args.length === 0) {
    reporter.printError('Usage: envbox remove <pkg>...')
    return 1
  }

  const box = await Environment.open(options.cwd, options.environment)
  const result = await box.remove(...options.args)

  if (!result.installed) {
    reporter.printInfo('None of the packages were declared; nothing to uninstall.')
  }

  return 0
}
