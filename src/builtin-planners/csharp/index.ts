/**
 * C# (.NET) planner
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { globSync } from 'glob'
import type { Planner } from '../../planners/registry.js'
import type { Plan } from '../../core/types.js'
import { createPlan } from '../../core/plan.js'

/**
 * Project files directly inside `projectDir`, sorted by name
 */
export function findProjectFiles(projectDir: string): string[] {
  if (!fs.existsSync(projectDir)) {
    return []
  }
  return globSync('*.csproj', { cwd: projectDir, nodir: true }).sort()
}

/**
 * Create the C# planner
 */
export function createCsharpPlanner(): Planner {
  return {
    name: 'csharp',

    detect(projectDir: string): boolean {
      return findProjectFiles(projectDir).length > 0
    },

    buildPlan(projectDir: string): Plan {
      const [projectFile] = findProjectFiles(projectDir)
      const assembly = path.basename(projectFile ?? 'app.csproj', '.csproj')

      return createPlan({
        devPackages: ['dotnet-sdk'],
        runtimePackages: ['dotnet-sdk'],
        installStage: { command: ['dotnet restore'] },
        buildStage: { command: ['dotnet publish -c Release -o out'] },
        startStage: { command: [`dotnet out/${assembly}.dll`] },
      })
    },
  }
}
