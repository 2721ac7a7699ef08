/**
 * Build command - Build a container image for the project
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the build command
 */
export async function runBuild(options: CommandOptions): Promise<number> {
  const box = await Environment.open(options.cwd, options.environment)
  await box.build({ name: options.name })

  reporter.printSuccess('Image built')
  return 0
}
