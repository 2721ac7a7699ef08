/**
 * Loading, validating and saving envbox.json
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig'
import { z } from 'zod'
import type { EnvboxConfig, Stage } from './types.js'
import { ConfigMalformedError, ConfigNotFoundError, ConfigWriteError } from './errors.js'

/**
 * Name of the declaration file
 */
export const CONFIG_FILENAME = 'envbox.json'

const MODULE_NAME = 'envbox'

// =============================================================================
// Schema
// =============================================================================

// A single string is accepted wherever a command list is expected
const commandListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === 'string' ? [value] : value))

const stageSchema = z
  .object({
    command: commandListSchema.optional(),
  })
  .strict()

const configFileSchema = z
  .object({
    packages: z.array(z.string().min(1)).default([]),
    shell: z
      .object({
        init_hook: commandListSchema.optional(),
      })
      .strict()
      .optional(),
    install_stage: stageSchema.nullish(),
    build_stage: stageSchema.nullish(),
    start_stage: stageSchema.nullish(),
  })
  .passthrough()

const KNOWN_KEYS = new Set(Object.keys(configFileSchema.shape))

/**
 * envbox.json as it is written on disk
 */
export type ConfigFile = z.input<typeof configFileSchema>

type ParsedConfigFile = z.output<typeof configFileSchema>

// =============================================================================
// Conversion
// =============================================================================

function uniq(values: string[]): string[] {
  return [...new Set(values)]
}

function toStage(stage: ParsedConfigFile['install_stage']): Stage | undefined {
  if (!stage) {
    return undefined
  }
  return { command: stage.command ?? [] }
}

function fromConfigFile(file: ParsedConfigFile): EnvboxConfig {
  const config: EnvboxConfig = {
    packages: uniq(file.packages),
    shell: { initHook: (file.shell?.init_hook ?? []).join('\n') },
  }

  const installStage = toStage(file.install_stage)
  const buildStage = toStage(file.build_stage)
  const startStage = toStage(file.start_stage)

  if (installStage) config.installStage = installStage
  if (buildStage) config.buildStage = buildStage
  if (startStage) config.startStage = startStage

  const extras = Object.fromEntries(Object.entries(file).filter(([key]) => !KNOWN_KEYS.has(key)))
  if (Object.keys(extras).length > 0) config.extras = extras

  return config
}

/**
 * Convert a config to its on-disk shape
 */
export function toConfigFile(config: EnvboxConfig): ConfigFile {
  const file: ConfigFile = {
    ...config.extras,
    packages: [...config.packages],
    shell: { init_hook: config.shell.initHook ? config.shell.initHook.split('\n') : [] },
  }

  if (config.installStage) file.install_stage = { command: [...config.installStage.command] }
  if (config.buildStage) file.build_stage = { command: [...config.buildStage.command] }
  if (config.startStage) file.start_stage = { command: [...config.startStage.command] }

  return file
}

/**
 * Validate raw file contents against the envbox.json schema
 */
export function parseConfig(raw: unknown, filepath: string): EnvboxConfig {
  const result = configFileSchema.safeParse(raw)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${where}: ${issue.message}`
    })
    throw new ConfigMalformedError(filepath, issues, result.error)
  }

  return fromConfigFile(result.data)
}

// =============================================================================
// Lookup
// =============================================================================

/**
 * Find the directory holding envbox.json, walking up from `startDir` to the
 * filesystem root
 */
export function findConfigDir(startDir: string): string {
  let dir = path.resolve(startDir)
  const { root } = path.parse(dir)

  while (true) {
    if (fs.existsSync(path.join(dir, CONFIG_FILENAME))) {
      return dir
    }

    if (dir === root) {
      break
    }
    dir = path.dirname(dir)
  }

  throw new ConfigNotFoundError(startDir)
}

// =============================================================================
// Loading & Saving
// =============================================================================

/**
 * Load configuration result
 */
export interface LoadConfigResult {
  /** The validated configuration */
  config: EnvboxConfig
  /** Path to the config file */
  filepath: string
  /** Directory holding the config file */
  dir: string
}

/**
 * Load envbox.json from `startDir` or its nearest ancestor
 */
export async function loadConfig(startDir: string): Promise<LoadConfigResult> {
  const dir = findConfigDir(startDir)
  const filepath = path.join(dir, CONFIG_FILENAME)
  const explorer = cosmiconfig(MODULE_NAME, { cache: false })

  let result: CosmiconfigResult = null

  try {
    result = await explorer.load(filepath)
  } catch (error) {
    throw new ConfigMalformedError(
      filepath,
      [error instanceof Error ? error.message : String(error)],
      error
    )
  }

  if (result === null || result.isEmpty) {
    throw new ConfigMalformedError(filepath, ['file is empty'])
  }

  return {
    config: parseConfig(result.config, filepath),
    filepath,
    dir,
  }
}

/**
 * Write the whole config file, replacing what is on disk
 */
export function saveConfig(filepath: string, config: EnvboxConfig): void {
  try {
    fs.writeFileSync(filepath, JSON.stringify(toConfigFile(config), null, 2) + '\n')
  } catch (error) {
    throw new ConfigWriteError(filepath, error)
  }
}

/**
 * Default configuration for a new project
 */
export function defaultConfig(): EnvboxConfig {
  return {
    packages: [],
    shell: { initHook: '' },
  }
}

/**
 * Create envbox.json in `dir` unless one already exists
 *
 * @returns whether a file was created
 */
export function initConfig(dir: string): boolean {
  const filepath = path.join(dir, CONFIG_FILENAME)
  if (fs.existsSync(filepath)) {
    return false
  }
  saveConfig(filepath, defaultConfig())
  return true
}
