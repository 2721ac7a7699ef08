/**
 * Generate command - Write the shell and build files
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the generate command
 */
export async function runGenerate(options: CommandOptions): Promise<number> {
  const box = await Environment.open(options.cwd, options.environment)
  const files = box.generate()

  reporter.printSuccess(`Generated ${files.length} files`)
  return 0
}
