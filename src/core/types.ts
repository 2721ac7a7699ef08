/**
 * envbox core type definitions
 */

// =============================================================================
// Plan Types
// =============================================================================

/**
 * Names of the three lifecycle stage slots
 */
export type StageName = 'install' | 'build' | 'start'

/**
 * A lifecycle stage. An empty command list means the stage is absent.
 */
export interface Stage {
  /** Shell commands, run in order */
  command: string[]
}

/**
 * An error reported by a planner about its own output
 */
export interface PlanError {
  /** Human-readable description */
  message: string
  /** Stage the error applies to; omitted when the whole plan is affected */
  stage?: StageName
}

/**
 * Packages and stage commands for an environment.
 *
 * Used for the user-declared plan, for the plan inferred from the source
 * tree and for the merged result. Plans are never mutated once built.
 */
export interface Plan {
  /** Packages available in the development shell */
  devPackages: string[]
  /** Packages installed into the runtime image */
  runtimePackages: string[]
  installStage: Stage
  buildStage: Stage
  startStage: Stage
  /** Shell snippet contributed by the plan, run when a shell starts */
  shellInitHook: string
  /** Stages a planner requires verbatim; a different user stage conflicts */
  lockedStages: StageName[]
  /** Problems that make the plan unusable unless overridden */
  errors: PlanError[]
  /** Non-fatal advisories */
  warnings: string[]
  /** Name of the planner that produced the plan, if any */
  source?: string
}

// =============================================================================
// Config Types
// =============================================================================

/**
 * Shell settings from envbox.json
 */
export interface ShellConfig {
  /** Script run inside the project root when a shell starts */
  initHook: string
}

/**
 * The persisted project declaration (envbox.json)
 */
export interface EnvboxConfig {
  /** Package identifiers, in declaration order, without duplicates */
  packages: string[]
  installStage?: Stage
  buildStage?: Stage
  startStage?: Stage
  shell: ShellConfig
  /** Top-level keys envbox does not use, kept as-is when the file is rewritten */
  extras?: Record<string, unknown>
}

// =============================================================================
// Generation Types
// =============================================================================

/**
 * Per-render data handed to the templates
 */
export interface GenerationContext {
  /** The plan being rendered */
  plan: Plan
  /** Project root (the directory holding envbox.json) */
  projectDir: string
  /** Profile directory the installer writes into */
  profileDir: string
  /** Directory prepended to PATH inside the shell */
  profileBinDir: string
  /** Shell history file */
  historyFile: string
  /** User-declared init hook (may be empty) */
  userHook: string
  /** Original shell init file contents, copied verbatim (may be empty) */
  originalInit: string
  /** Path of the original shell init file (may be empty) */
  originalInitPath: string
}

/**
 * Template name -> output path relative to the target directory
 */
export type TemplateSet = Readonly<Record<string, string>>

// =============================================================================
// Collaborator Types
// =============================================================================

/**
 * Answers whether a package identifier exists in the package index
 */
export interface PackageIndex {
  exists: (pkg: string) => Promise<boolean>
}

/**
 * Installs a derivation file into a profile directory
 */
export interface PackageInstaller {
  apply: (profileDir: string, derivationPath: string) => Promise<void>
}

/**
 * Container build flags
 */
export interface BuildFlags {
  /** Image name/tag */
  name?: string
  /** Build instruction file (defaults to the generated Dockerfile) */
  dockerfilePath?: string
  /** Extra tags */
  tags?: string[]
}

/**
 * Builds a container image from a build-instruction file
 */
export interface ContainerBuilder {
  build: (contextDir: string, flags: BuildFlags & { dockerfilePath: string }) => Promise<void>
}

/**
 * Options for starting an interactive shell
 */
export interface ShellRunOptions {
  /** Generated shell definition file */
  shellFilePath: string
  /** Generated shell init file */
  rcFilePath: string
  /** Project root */
  projectDir: string
}

/**
 * Starts an interactive shell, or runs commands, inside the environment
 */
export interface ShellLauncher {
  run: (options: ShellRunOptions) => Promise<void>
  exec: (shellFilePath: string, commands: string[]) => Promise<void>
}

// =============================================================================
// Environment Types
// =============================================================================

/**
 * Lifecycle phase of an opened environment
 */
export type EnvironmentPhase = 'uninitialized' | 'configured' | 'planned' | 'generated' | 'realized'

/**
 * Install direction, used for progress and update messages
 */
export type InstallMode = 'install' | 'uninstall'
