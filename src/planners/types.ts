/**
 * Planner type definitions
 *
 * Re-exports from core types for planner authors
 */

export type { Planner } from './registry.js'
export type { Plan, PlanError, Stage, StageName } from '../core/types.js'
