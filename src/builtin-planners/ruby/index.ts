/**
 * Ruby (bundler) planner
 */

import type { Planner } from '../../planners/registry.js'
import type { Plan } from '../../core/types.js'
import { createPlan } from '../../core/plan.js'
import { hasFile } from '../../planners/helpers.js'

/**
 * Create the Ruby planner
 */
export function createRubyPlanner(): Planner {
  return {
    name: 'ruby',

    detect(projectDir: string): boolean {
      return hasFile(projectDir, 'Gemfile')
    },

    buildPlan(projectDir: string): Plan {
      const isRack = hasFile(projectDir, 'config.ru')

      return createPlan({
        devPackages: ['ruby', 'bundler'],
        runtimePackages: ['ruby', 'bundler'],
        installStage: { command: ['bundle install'] },
        startStage: { command: isRack ? ['bundle exec rackup'] : [] },
        errors: isRack
          ? []
          : [{ stage: 'start', message: 'no config.ru found; declare a start_stage in envbox.json' }],
      })
    },
  }
}
