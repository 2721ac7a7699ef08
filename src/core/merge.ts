/**
 * Merging a user-declared plan with the plan inferred from the source tree
 *
 * Packages are unioned (user order first). Stages are taken whole from the
 * user plan when declared there, otherwise from the inferred plan.
 */

import type { Plan, Stage, StageName } from './types.js'
import { STAGES, isStageAbsent } from './plan.js'
import { PlanConflictError } from './errors.js'

/**
 * Union of two package lists, keeping first-seen order
 */
export function mergePackages(user: string[], inferred: string[]): string[] {
  const merged: string[] = []
  const seen = new Set<string>()

  for (const pkg of [...user, ...inferred]) {
    if (!seen.has(pkg)) {
      seen.add(pkg)
      merged.push(pkg)
    }
  }

  return merged
}

function sameCommands(a: Stage, b: Stage): boolean {
  return a.command.length === b.command.length && a.command.every((cmd, i) => cmd === b.command[i])
}

function describeSource(plan: Plan): string {
  return plan.source ? `inferred ${plan.source} plan` : 'inferred plan'
}

/**
 * Hard conflicts between the two plans, as messages
 */
function findConflicts(user: Plan, inferred: Plan, declared: Set<StageName>): string[] {
  const conflicts: string[] = []
  const source = describeSource(inferred)

  for (const { name, field } of STAGES) {
    if (
      inferred.lockedStages.includes(name) &&
      declared.has(name) &&
      !sameCommands(user[field], inferred[field])
    ) {
      conflicts.push(`${source} requires its own ${name} stage, but envbox.json declares a different one`)
    }
  }

  for (const error of inferred.errors) {
    const overridden = error.stage ? declared.has(error.stage) : declared.size === STAGES.length
    if (!overridden) {
      conflicts.push(`${source}: ${error.message}`)
    }
  }

  return conflicts
}

/**
 * Advisories about how the plans combined
 */
function collectWarnings(user: Plan, inferred: Plan, declared: Set<StageName>): string[] {
  const warnings = [...user.warnings, ...inferred.warnings]
  const source = describeSource(inferred)

  if (!inferred.source) {
    warnings.push('No supported project type detected; using the plan declared in envbox.json only')
    return warnings
  }

  for (const error of inferred.errors) {
    const overridden = error.stage ? declared.has(error.stage) : declared.size === STAGES.length
    if (overridden) {
      warnings.push(`${source}: ${error.message} (overridden by envbox.json)`)
    }
  }

  const inferredHasStages = STAGES.some(({ field }) => !isStageAbsent(inferred[field]))
  if (inferredHasStages && declared.size === STAGES.length) {
    warnings.push(`envbox.json overrides every stage of the ${source}`)
  }

  return warnings
}

/**
 * Merge the user plan with the inferred plan.
 *
 * @throws PlanConflictError when the inferred plan cannot be reconciled with
 * the user's stages
 */
export function mergePlans(user: Plan, inferred: Plan): Plan {
  const declared = new Set<StageName>(
    STAGES.filter(({ field }) => !isStageAbsent(user[field])).map(({ name }) => name)
  )

  const conflicts = findConflicts(user, inferred, declared)
  if (conflicts.length > 0) {
    throw new PlanConflictError(conflicts)
  }

  const pick = (field: 'installStage' | 'buildStage' | 'startStage'): Stage => {
    const stage = isStageAbsent(user[field]) ? inferred[field] : user[field]
    return { command: [...stage.command] }
  }

  return {
    devPackages: mergePackages(user.devPackages, inferred.devPackages),
    runtimePackages: mergePackages(user.runtimePackages, inferred.runtimePackages),
    installStage: pick('installStage'),
    buildStage: pick('buildStage'),
    startStage: pick('startStage'),
    shellInitHook: user.shellInitHook || inferred.shellInitHook,
    lockedStages: [],
    errors: [],
    warnings: collectWarnings(user, inferred, declared),
    source: inferred.source,
  }
}
