/**
 * Node.js planner
 *
 * Detects package.json. Uses yarn when a yarn.lock is present and picks the
 * Node.js package from `engines.node`.
 */

import type { Planner } from '../../planners/registry.js'
import type { Plan, Stage } from '../../core/types.js'
import { createPlan } from '../../core/plan.js'
import { hasFile, isRecord, readJson } from '../../planners/helpers.js'

/**
 * Node.js majors with a dedicated package
 */
const SUPPORTED_MAJORS = ['12', '14', '16', '18', '19', '20']

/**
 * Pick the Node.js package for an `engines.node` range
 */
export function nodePackage(engines: unknown): string {
  if (!isRecord(engines) || typeof engines.node !== 'string') {
    return 'nodejs'
  }

  const major = engines.node.match(/\d+/)?.[0]
  if (major && SUPPORTED_MAJORS.includes(major)) {
    return `nodejs-${major}_x`
  }

  return 'nodejs'
}

function stage(...command: string[]): Stage {
  return { command }
}

/**
 * Create the Node.js planner
 */
export function createNodejsPlanner(): Planner {
  return {
    name: 'nodejs',

    detect(projectDir: string): boolean {
      return hasFile(projectDir, 'package.json')
    },

    buildPlan(projectDir: string): Plan {
      const manifest = readJson(projectDir, 'package.json')
      if (!manifest.ok) {
        return createPlan({ errors: [{ message: manifest.error }] })
      }

      const pkg = isRecord(manifest.value) ? manifest.value : {}
      const scripts = isRecord(pkg.scripts) ? pkg.scripts : {}
      const useYarn = hasFile(projectDir, 'yarn.lock')
      const runner = useYarn ? 'yarn' : 'npm'
      const node = nodePackage(pkg.engines)

      let startStage = stage()
      if (typeof scripts.start === 'string') {
        startStage = stage(`${runner} start`)
      } else if (hasFile(projectDir, 'index.js')) {
        startStage = stage('node index.js')
      }

      return createPlan({
        devPackages: useYarn ? [node, 'yarn'] : [node],
        runtimePackages: [node],
        installStage: stage(useYarn ? 'yarn install --frozen-lockfile' : 'npm install'),
        buildStage: typeof scripts.build === 'string' ? stage(`${runner} ${useYarn ? 'build' : 'run build'}`) : stage(),
        startStage,
      })
    },
  }
}
