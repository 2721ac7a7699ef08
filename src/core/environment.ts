/**
 * An envbox environment rooted at the directory holding envbox.json
 *
 * Every operation re-reads the declared config into a fresh plan, renders the
 * files and then hands over to the installer, container builder or shell.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import type {
  BuildFlags,
  ContainerBuilder,
  EnvboxConfig,
  EnvironmentPhase,
  GenerationContext,
  InstallMode,
  PackageIndex,
  PackageInstaller,
  Plan,
  ShellLauncher,
  TemplateSet,
} from './types.js'
import type { Planner } from '../planners/registry.js'
import { getPlanners, inferPlan } from '../planners/registry.js'
import { loadConfig, saveConfig } from './config.js'
import { planFromConfig, shellContribution } from './plan.js'
import { mergePlans } from './merge.js'
import { BUILD_FILES, SHELL_FILES, generate, withoutTemplates } from './generator.js'
import { EnvboxError, InstallError, PackageNotFoundError } from './errors.js'
import { NixInstaller, NixPackageIndex, NixShellLauncher } from './nix.js'
import { DockerBuilder } from './docker.js'
import * as reporter from './reporter.js'

// =============================================================================
// Paths
// =============================================================================

/** Generated files, relative to the project root */
export const GEN_DIR = '.envbox/gen'

/** Installer profile, relative to the project root */
export const PROFILE_DIR = '.envbox/nix/profile/default'

/** History of commands run inside the shell, relative to the project root */
export const SHELL_HISTORY_FILE = '.envbox/shell_history'

// =============================================================================
// Options
// =============================================================================

/**
 * Collaborators and settings for an environment
 */
export interface EnvironmentOptions {
  /** Whether the caller runs inside an envbox shell */
  shellEnabled?: boolean
  /** Original shell init file copied into the generated shellrc */
  shellRcPath?: string
  /** Planners to infer the build plan with (default: the registry) */
  planners?: Planner[]
  /** Directory holding the `.hbs` templates */
  templatesDir?: string
  packageIndex?: PackageIndex
  installer?: PackageInstaller
  containerBuilder?: ContainerBuilder
  shellLauncher?: ShellLauncher
}

/**
 * Outcome of an add or remove
 */
export interface PackageUpdateResult {
  /** Packages whose membership actually changed */
  changed: string[]
  /** Whether the installer ran */
  installed: boolean
}

function uniq(values: string[]): string[] {
  return [...new Set(values)]
}

// =============================================================================
// Environment
// =============================================================================

export class Environment {
  private config: EnvboxConfig
  private currentPhase: EnvironmentPhase = 'configured'
  private readonly shellEnabled: boolean
  private readonly packageIndex: PackageIndex
  private readonly installer: PackageInstaller
  private readonly containerBuilder: ContainerBuilder
  private readonly shellLauncher: ShellLauncher

  private constructor(
    /** Directory holding envbox.json */
    readonly projectDir: string,
    readonly configPath: string,
    config: EnvboxConfig,
    private readonly options: EnvironmentOptions
  ) {
    this.config = config
    this.shellEnabled = options.shellEnabled ?? false
    this.packageIndex = options.packageIndex ?? new NixPackageIndex()
    this.installer = options.installer ?? new NixInstaller()
    this.containerBuilder = options.containerBuilder ?? new DockerBuilder()
    this.shellLauncher = options.shellLauncher ?? new NixShellLauncher()
  }

  /**
   * Open the environment declared by the nearest envbox.json above `dir`
   */
  static async open(dir: string, options: EnvironmentOptions = {}): Promise<Environment> {
    const { config, filepath, dir: projectDir } = await loadConfig(dir)
    reporter.printDebug(`Loaded ${filepath}`)
    return new Environment(projectDir, filepath, config, options)
  }

  /**
   * Current lifecycle phase
   */
  get phase(): EnvironmentPhase {
    return this.currentPhase
  }

  /**
   * A copy of the declared config
   */
  getConfig(): EnvboxConfig {
    return structuredClone(this.config)
  }

  // ---------------------------------------------------------------------------
  // Plans
  // ---------------------------------------------------------------------------

  private planners(): Planner[] {
    return this.options.planners ?? getPlanners()
  }

  /**
   * Plan for the development shell: the declared plan plus the packages and
   * init hook of the inferred plan
   */
  shellPlan(): Plan {
    const inferred = inferPlan(this.projectDir, this.planners())
    const plan = mergePlans(planFromConfig(this.config), shellContribution(inferred))
    this.currentPhase = 'planned'
    return plan
  }

  /**
   * Plan for container builds: the declared plan merged with the inferred plan
   *
   * @throws PlanConflictError
   */
  buildPlan(): Plan {
    const inferred = inferPlan(this.projectDir, this.planners())
    reporter.printDebug(inferred.source ? `Detected ${inferred.source} project` : 'No project type detected')

    const plan = mergePlans(planFromConfig(this.config), inferred)
    this.currentPhase = 'planned'
    return plan
  }

  // ---------------------------------------------------------------------------
  // Generation
  // ---------------------------------------------------------------------------

  private genDir(): string {
    return path.join(this.projectDir, GEN_DIR)
  }

  private profileDir(): string {
    const profileDir = path.join(this.projectDir, PROFILE_DIR)
    try {
      fs.mkdirSync(path.dirname(profileDir), { recursive: true })
    } catch (error) {
      throw new EnvboxError(`create profile directory ${path.dirname(profileDir)}`, error)
    }
    return profileDir
  }

  private readOriginalInit(): string {
    const rcPath = this.options.shellRcPath
    if (!rcPath || !fs.existsSync(rcPath)) {
      return ''
    }
    return fs.readFileSync(rcPath, 'utf-8')
  }

  private generationContext(plan: Plan): GenerationContext {
    const profileDir = path.join(this.projectDir, PROFILE_DIR)
    const originalInit = this.readOriginalInit()

    return {
      plan,
      projectDir: this.projectDir,
      profileDir,
      profileBinDir: path.join(profileDir, 'bin'),
      historyFile: path.join(this.projectDir, SHELL_HISTORY_FILE),
      userHook: this.config.shell.initHook,
      originalInit,
      originalInitPath: originalInit ? (this.options.shellRcPath ?? '') : '',
    }
  }

  private writeFiles(plan: Plan, templates: TemplateSet): string[] {
    const files = generate(this.genDir(), this.generationContext(plan), templates, {
      templatesDir: this.options.templatesDir,
    })
    reporter.printGenerated(files)
    this.currentPhase = 'generated'
    return files
  }

  /**
   * Write the shell files for the current config
   */
  generateShellFiles(): string[] {
    return this.writeFiles(this.shellPlan(), SHELL_FILES)
  }

  /**
   * Write the build files for the current config, printing plan warnings
   */
  generateBuildFiles(): string[] {
    return this.writeBuildFiles(this.buildPlan(), BUILD_FILES)
  }

  private writeBuildFiles(plan: Plan, templates: TemplateSet): string[] {
    for (const warning of plan.warnings) {
      reporter.printWarning(warning)
    }
    return this.writeFiles(plan, templates)
  }

  /**
   * Write both the shell and the build files, each file once.
   *
   * The build plan is merged first so a conflict leaves no files behind.
   */
  generate(): string[] {
    const buildPlan = this.buildPlan()
    return [
      ...this.generateShellFiles(),
      ...this.writeBuildFiles(buildPlan, withoutTemplates(BUILD_FILES, SHELL_FILES)),
    ]
  }

  // ---------------------------------------------------------------------------
  // Packages
  // ---------------------------------------------------------------------------

  private save(): void {
    saveConfig(this.configPath, this.config)
  }

  /**
   * Add packages to envbox.json and install them.
   *
   * Every package is checked against the package index first; if any is
   * unknown nothing is added. Packages already declared are skipped, and
   * the installer only runs when something was added.
   *
   * @throws PackageNotFoundError
   */
  async add(...pkgs: string[]): Promise<PackageUpdateResult> {
    const missing: string[] = []
    for (const pkg of uniq(pkgs)) {
      if (!(await this.packageIndex.exists(pkg))) {
        missing.push(pkg)
      }
    }
    if (missing.length > 0) {
      throw new PackageNotFoundError(missing)
    }

    const added = uniq(pkgs).filter((pkg) => !this.config.packages.includes(pkg))
    this.config = { ...this.config, packages: [...this.config.packages, ...added] }
    this.save()

    if (added.length > 0) {
      await this.ensurePackagesAreInstalled('install')
    }

    reporter.printPackageUpdate('install', pkgs, this.shellEnabled)
    return { changed: added, installed: added.length > 0 }
  }

  /**
   * Remove packages from envbox.json and uninstall them.
   *
   * Packages that are not declared are ignored; the installer only runs when
   * something was removed.
   */
  async remove(...pkgs: string[]): Promise<PackageUpdateResult> {
    const removed = this.config.packages.filter((pkg) => pkgs.includes(pkg))
    this.config = {
      ...this.config,
      packages: this.config.packages.filter((pkg) => !pkgs.includes(pkg)),
    }
    this.save()

    if (removed.length > 0) {
      await this.ensurePackagesAreInstalled('uninstall')
    }

    reporter.printPackageUpdate('uninstall', pkgs, this.shellEnabled)
    return { changed: removed, installed: removed.length > 0 }
  }

  private async ensurePackagesAreInstalled(mode: InstallMode): Promise<void> {
    this.generateShellFiles()

    reporter.printInstalling(mode)

    const derivationPath = path.join(this.genDir(), 'development.nix')
    try {
      await this.installer.apply(this.profileDir(), derivationPath)
    } catch (error) {
      if (error instanceof EnvboxError) {
        throw error
      }
      throw new InstallError(`apply ${derivationPath}`, undefined, '', error)
    }

    this.currentPhase = 'realized'
  }

  // ---------------------------------------------------------------------------
  // Shell & Build
  // ---------------------------------------------------------------------------

  /**
   * Build a container image from the generated Dockerfile
   */
  async build(flags: BuildFlags = {}): Promise<void> {
    this.generateBuildFiles()

    await this.containerBuilder.build(this.projectDir, {
      ...flags,
      dockerfilePath: flags.dockerfilePath ?? path.join(this.genDir(), 'Dockerfile'),
    })
  }

  /**
   * Install the declared packages and start an interactive shell
   */
  async shell(): Promise<void> {
    await this.ensurePackagesAreInstalled('install')

    await this.shellLauncher.run({
      shellFilePath: path.join(this.genDir(), 'shell.nix'),
      rcFilePath: path.join(this.genDir(), 'shellrc'),
      projectDir: this.projectDir,
    })
  }

  /**
   * Install the declared packages and run a command with the profile on PATH
   */
  async exec(...cmds: string[]): Promise<void> {
    await this.ensurePackagesAreInstalled('install')

    const binDir = path.join(this.profileDir(), 'bin')
    await this.shellLauncher.exec(path.join(this.genDir(), 'shell.nix'), [`PATH=${binDir}:$PATH`, ...cmds])
  }
}
