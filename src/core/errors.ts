/**
 * Error types raised by envbox operations
 */

// =============================================================================
// Base
// =============================================================================

export class EnvboxError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'EnvboxError'
  }
}

// =============================================================================
// Config
// =============================================================================

export class ConfigNotFoundError extends EnvboxError {
  constructor(public readonly dir: string) {
    super(
      `No envbox.json found in ${dir}, or any parent directories. Did you run \`envbox init\` yet?`
    )
    this.name = 'ConfigNotFoundError'
  }
}

export class ConfigMalformedError extends EnvboxError {
  constructor(
    public readonly filepath: string,
    public readonly issues: string[],
    cause?: unknown
  ) {
    super(`Invalid config ${filepath}: ${issues.join('; ')}`, cause)
    this.name = 'ConfigMalformedError'
  }
}

export class ConfigWriteError extends EnvboxError {
  constructor(
    public readonly filepath: string,
    cause: unknown
  ) {
    super(`Failed to write ${filepath}: ${describeCause(cause)}`, cause)
    this.name = 'ConfigWriteError'
  }
}

// =============================================================================
// Packages
// =============================================================================

export class PackageNotFoundError extends EnvboxError {
  constructor(public readonly packages: string[]) {
    super(
      packages.length === 1
        ? `package ${packages[0]} not found`
        : `packages ${packages.join(', ')} not found`
    )
    this.name = 'PackageNotFoundError'
  }
}

// =============================================================================
// Plan & Generation
// =============================================================================

export class PlanConflictError extends EnvboxError {
  constructor(public readonly conflicts: string[]) {
    super(conflicts.join('; '))
    this.name = 'PlanConflictError'
  }
}

export class GenerationError extends EnvboxError {
  constructor(
    public readonly template: string,
    cause: unknown
  ) {
    super(`template ${template}: ${describeCause(cause)}`, cause)
    this.name = 'GenerationError'
  }
}

// =============================================================================
// External Commands
// =============================================================================

export class InstallError extends EnvboxError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | undefined,
    public readonly output: string,
    cause?: unknown
  ) {
    super(
      exitCode === undefined
        ? `running command ${command}: ${describeCause(cause)}`
        : `running command ${command}: exit status ${exitCode} with command output: ${output}`,
      cause
    )
    this.name = 'InstallError'
  }
}

export class ContainerBuildError extends EnvboxError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'ContainerBuildError'
  }
}

export class ShellError extends EnvboxError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'ShellError'
  }
}

// =============================================================================
// Formatting
// =============================================================================

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Format an error as a single `<context>: <cause>` line
 */
export function formatError(context: string, error: unknown): string {
  const message = describeCause(error).split('\n')[0]
  return `${context}: ${message}`
}
