/**
 * Plan construction helpers
 */

import type { EnvboxConfig, Plan, Stage, StageName } from './types.js'

/**
 * Stage slots in lifecycle order, with the Plan field holding each
 */
export const STAGES: ReadonlyArray<{ name: StageName; field: 'installStage' | 'buildStage' | 'startStage' }> = [
  { name: 'install', field: 'installStage' },
  { name: 'build', field: 'buildStage' },
  { name: 'start', field: 'startStage' },
]

/**
 * An absent stage
 */
export function emptyStage(): Stage {
  return { command: [] }
}

/**
 * Whether a stage has no commands
 */
export function isStageAbsent(stage: Stage | undefined): boolean {
  return !stage || stage.command.length === 0
}

/**
 * A plan with no packages, no stages and no issues
 */
export function emptyPlan(): Plan {
  return {
    devPackages: [],
    runtimePackages: [],
    installStage: emptyStage(),
    buildStage: emptyStage(),
    startStage: emptyStage(),
    shellInitHook: '',
    lockedStages: [],
    errors: [],
    warnings: [],
  }
}

/**
 * Build a plan from the fields a planner cares about, filling in the rest
 */
export function createPlan(fields: Partial<Plan>): Plan {
  return { ...emptyPlan(), ...fields }
}

/**
 * Derive the user plan from the declared config.
 *
 * Declared packages are both dev and runtime packages.
 */
export function planFromConfig(config: EnvboxConfig): Plan {
  return createPlan({
    devPackages: [...config.packages],
    runtimePackages: [...config.packages],
    installStage: { command: [...(config.installStage?.command ?? [])] },
    buildStage: { command: [...(config.buildStage?.command ?? [])] },
    startStage: { command: [...(config.startStage?.command ?? [])] },
  })
}

/**
 * The part of an inferred plan that applies to the development shell:
 * packages and init hook, without stages or errors
 */
export function shellContribution(plan: Plan): Plan {
  return createPlan({
    devPackages: [...plan.devPackages],
    shellInitHook: plan.shellInitHook,
    source: plan.source,
  })
}

/**
 * Whether a plan carries errors
 */
export function isInvalid(plan: Plan): boolean {
  return plan.errors.length > 0
}
