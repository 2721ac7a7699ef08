/**
 * envbox - Declarative development environments
 *
 * @packageDocumentation
 */

// Core types
export type {
  StageName,
  Stage,
  PlanError,
  Plan,
  ShellConfig,
  EnvboxConfig,
  GenerationContext,
  TemplateSet,
  PackageIndex,
  PackageInstaller,
  BuildFlags,
  ContainerBuilder,
  ShellRunOptions,
  ShellLauncher,
  EnvironmentPhase,
  InstallMode,
} from './core/types.js'

// Errors
export {
  EnvboxError,
  ConfigNotFoundError,
  ConfigMalformedError,
  ConfigWriteError,
  PackageNotFoundError,
  PlanConflictError,
  GenerationError,
  InstallError,
  ContainerBuildError,
  ShellError,
  formatError,
} from './core/errors.js'

// Config
export {
  CONFIG_FILENAME,
  findConfigDir,
  loadConfig,
  saveConfig,
  initConfig,
  defaultConfig,
  parseConfig,
  toConfigFile,
} from './core/config.js'
export type { ConfigFile, LoadConfigResult } from './core/config.js'

// Plans
export {
  STAGES,
  emptyStage,
  emptyPlan,
  createPlan,
  isStageAbsent,
  isInvalid,
  planFromConfig,
  shellContribution,
} from './core/plan.js'
export { mergePlans, mergePackages } from './core/merge.js'

// Planners
export {
  builtinPlanners,
  registerPlanner,
  getPlanners,
  findPlanner,
  resetRegistry,
  inferPlan,
  createPlanner,
} from './planners/registry.js'
export type { Planner } from './planners/registry.js'

// Generation
export {
  SHELL_FILES,
  BUILD_FILES,
  generate,
  withoutTemplates,
  renderTemplate,
  defaultTemplatesDir,
  clearTemplateCache,
} from './core/generator.js'
export type { GenerateOptions } from './core/generator.js'

// Environment
export { Environment, GEN_DIR, PROFILE_DIR, SHELL_HISTORY_FILE } from './core/environment.js'
export type { EnvironmentOptions, PackageUpdateResult } from './core/environment.js'

// External tools
export { NixPackageIndex, NixInstaller, NixShellLauncher } from './core/nix.js'
export { DockerBuilder } from './core/docker.js'
export { INTERACTIVE_SHELL, isShellEnabled, shellRcPath } from './core/shell-env.js'

// Reporter (selected exports for programmatic use)
export { setColorsEnabled, setVerbose } from './core/reporter.js'
