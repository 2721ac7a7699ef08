/**
 * Go planner
 */

import type { Planner } from '../../planners/registry.js'
import type { Plan } from '../../core/types.js'
import { createPlan } from '../../core/plan.js'
import { hasFile, readText } from '../../planners/helpers.js'

/**
 * Pick the Go package for the `go` directive in go.mod
 */
export function goPackage(goMod: string | null): string {
  const match = goMod?.match(/^go\s+1\.(\d+)/m)
  return match ? `go_1_${match[1]}` : 'go'
}

/**
 * Create the Go planner
 */
export function createGolangPlanner(): Planner {
  return {
    name: 'golang',

    detect(projectDir: string): boolean {
      return hasFile(projectDir, 'go.mod')
    },

    buildPlan(projectDir: string): Plan {
      return createPlan({
        devPackages: [goPackage(readText(projectDir, 'go.mod'))],
        // The binary is statically linked
        runtimePackages: [],
        installStage: { command: ['go get'] },
        buildStage: { command: ['CGO_ENABLED=0 go build -o dist/app'] },
        startStage: { command: ['./dist/app'] },
      })
    },
  }
}
