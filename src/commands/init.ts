/**
 * Init command - Create envbox.json
 */

import * as path from 'node:path'
import { initConfig, CONFIG_FILENAME } from '../core/config.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the init command
 */
export async function runInit(options: CommandOptions): Promise<number> {
  const dir = path.resolve(options.cwd, options.args[0] ?? '.')

  if (initConfig(dir)) {
    reporter.printSuccess(`Created ${path.join(dir, CONFIG_FILENAME)}`)
  } else {
    reporter.printInfo(`${CONFIG_FILENAME} already exists in ${dir}`)
  }

  return 0
}
