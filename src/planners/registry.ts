/**
 * Planner registry and source inspection
 *
 * Planners are kept in a list, not a map: the first planner whose `detect`
 * returns true decides the inferred plan.
 */

import type { Plan } from '../core/types.js'
import { emptyPlan } from '../core/plan.js'
import { createCsharpPlanner } from '../builtin-planners/csharp/index.js'
import { createGolangPlanner } from '../builtin-planners/golang/index.js'
import { createNodejsPlanner } from '../builtin-planners/nodejs/index.js'
import { createPythonPlanner } from '../builtin-planners/python/index.js'
import { createRubyPlanner } from '../builtin-planners/ruby/index.js'
import { createRustPlanner } from '../builtin-planners/rust/index.js'

/**
 * Detects one kind of project and builds its default plan
 */
export interface Planner {
  /** Planner name (e.g., 'nodejs') */
  name: string
  /** Read-only check for the project's marker files */
  detect: (projectDir: string) => boolean
  /** Default plan for a detected project */
  buildPlan: (projectDir: string) => Plan
}

/**
 * Built-in planners in evaluation order
 */
export function builtinPlanners(): Planner[] {
  return [
    createCsharpPlanner(),
    createGolangPlanner(),
    createNodejsPlanner(),
    createPythonPlanner(),
    createRubyPlanner(),
    createRustPlanner(),
  ]
}

/**
 * Global planner registry
 */
let registry: Planner[] = builtinPlanners()

/**
 * Register a planner after the ones already registered
 */
export function registerPlanner(planner: Planner): void {
  registry.push(planner)
}

/**
 * Get the registered planners in evaluation order
 */
export function getPlanners(): Planner[] {
  return [...registry]
}

/**
 * Find a planner by name
 */
export function findPlanner(name: string): Planner | undefined {
  return registry.find((p) => p.name === name)
}

/**
 * Restore the registry to the built-in planners
 */
export function resetRegistry(): void {
  registry = builtinPlanners()
}

/**
 * Infer a plan for `projectDir` from the first planner that detects it.
 *
 * Returns an empty plan when no planner matches.
 */
export function inferPlan(projectDir: string, planners: Planner[] = registry): Plan {
  for (const planner of planners) {
    if (planner.detect(projectDir)) {
      return { ...planner.buildPlan(projectDir), source: planner.name }
    }
  }

  return emptyPlan()
}

/**
 * Create a planner from its parts
 */
export function createPlanner(
  name: string,
  parts: Omit<Planner, 'name'>
): Planner {
  return {
    name,
    ...parts,
  }
}
