/**
 * Python (pip) planner
 */

import type { Planner } from '../../planners/registry.js'
import type { Plan } from '../../core/types.js'
import { createPlan } from '../../core/plan.js'
import { hasFile } from '../../planners/helpers.js'

const VENV_ACTIVATE = '. .venv/bin/activate'

/**
 * Create the Python planner
 */
export function createPythonPlanner(): Planner {
  return {
    name: 'python',

    detect(projectDir: string): boolean {
      return hasFile(projectDir, 'requirements.txt')
    },

    buildPlan(projectDir: string): Plan {
      const hasMain = hasFile(projectDir, 'main.py')

      return createPlan({
        devPackages: ['python3'],
        runtimePackages: ['python3'],
        installStage: {
          command: ['python3 -m venv .venv', `${VENV_ACTIVATE} && pip install -r requirements.txt`],
        },
        startStage: { command: hasMain ? [`${VENV_ACTIVATE} && python main.py`] : [] },
        shellInitHook: `[ -f .venv/bin/activate ] && ${VENV_ACTIVATE}`,
        errors: hasMain
          ? []
          : [{ stage: 'start', message: 'no main.py found; declare a start_stage in envbox.json' }],
      })
    },
  }
}
