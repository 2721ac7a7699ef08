/**
 * Plan command - Show the merged build plan
 */

import { Environment } from '../core/environment.js'
import * as reporter from '../core/reporter.js'
import type { CommandOptions } from './types.js'

/**
 * Run the plan command
 */
export async function runPlan(options: CommandOptions): Promise<number> {
  const box = await Environment.open(options.cwd, options.environment)
  const plan = box.buildPlan()

  reporter.printPlan(plan)
  for (const warning of plan.warnings) {
    reporter.printWarning(warning)
  }

  return 0
}
