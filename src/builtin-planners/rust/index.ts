/**
 * Rust (cargo) planner
 */

import type { Planner } from '../../planners/registry.js'
import type { Plan } from '../../core/types.js'
import { createPlan } from '../../core/plan.js'
import { hasFile, readText } from '../../planners/helpers.js'

/**
 * Read the crate name from the `[package]` table of Cargo.toml
 */
export function crateName(cargoToml: string | null): string | null {
  if (!cargoToml) {
    return null
  }

  const table = cargoToml.match(/^\[package\][^\S\n]*\n([\s\S]*?)(?=^\[|(?![\s\S]))/m)
  const name = table?.[1].match(/^name\s*=\s*"([^"]+)"/m)
  return name ? name[1] : null
}

/**
 * Create the Rust planner
 */
export function createRustPlanner(): Planner {
  return {
    name: 'rust',

    detect(projectDir: string): boolean {
      return hasFile(projectDir, 'Cargo.toml')
    },

    buildPlan(projectDir: string): Plan {
      const name = crateName(readText(projectDir, 'Cargo.toml'))

      return createPlan({
        devPackages: ['rustc', 'cargo'],
        runtimePackages: [],
        installStage: { command: ['cargo fetch'] },
        buildStage: { command: ['cargo build --release'] },
        startStage: { command: name ? [`./target/release/${name}`] : [] },
        errors: name
          ? []
          : [{ stage: 'start', message: 'Cargo.toml has no [package] name; declare a start_stage in envbox.json' }],
      })
    },
  }
}
