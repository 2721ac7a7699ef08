#!/usr/bin/env node
/**
 * envbox CLI
 */

import * as os from 'node:os'
import * as reporter from './core/reporter.js'
import { formatError } from './core/errors.js'
import { isShellEnabled, shellRcPath } from './core/shell-env.js'
import type { CommandOptions } from './commands/types.js'

// Import commands
import { runInit } from './commands/init.js'
import { runAdd } from './commands/add.js'
import { runRemove } from './commands/remove.js'
import { runBuild } from './commands/build.js'
import { runGenerate } from './commands/generate.js'
import { runShell } from './commands/shell.js'
import { runExec } from './commands/exec.js'
import { runPlan } from './commands/plan.js'

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface ParsedArgs {
  command?: string
  args: string[]
  name?: string
  verbose?: boolean
  color?: boolean
  help?: boolean
  version?: boolean
}

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { args: [] }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    // Everything after `exec <cmd>` belongs to the command
    if (result.command === 'exec' && result.args.length > 0) {
      result.args.push(arg)
    } else if (arg === '--help' || arg === '-h') {
      result.help = true
    } else if (arg === '--version' || arg === '-v') {
      result.version = true
    } else if (arg === '--verbose') {
      result.verbose = true
    } else if (arg === '--no-color') {
      result.color = false
    } else if (arg.startsWith('--name=')) {
      result.name = arg.split('=')[1]
    } else if ((arg === '--name' || arg === '-n') && argv[i + 1]) {
      result.name = argv[++i]
    } else if (!arg.startsWith('-')) {
      if (!result.command) {
        result.command = arg
      } else {
        result.args.push(arg)
      }
    }

    i++
  }

  return result
}

// =============================================================================
// Help
// =============================================================================

function printHelp(): void {
  console.log(`
envbox - Declarative development environments

Usage:
  envbox <command> [options]

Commands:
  init [dir]          Create an envbox.json
  add <pkg>...        Add packages to the environment
  remove <pkg>...     Remove packages from the environment
  shell               Start a shell with the environment's packages
  exec <cmd>...       Run a command inside the environment
  generate            Write the shell and build files to .envbox/gen
  build               Build a container image for the project
  plan                Show the build plan

Options:
  --name, -n <tag>    Image name for build
  --verbose           Verbose output
  --no-color          Disable colors
  --help, -h          Show help
  --version, -v       Show version

Examples:
  envbox init
  envbox add git nodejs
  envbox build --name my-app
`)
}

function printVersion(): void {
  console.log('envbox v0.1.0')
}

// =============================================================================
// Main
// =============================================================================

const COMMANDS: Record<string, (options: CommandOptions) => Promise<number>> = {
  init: runInit,
  add: runAdd,
  remove: runRemove,
  build: runBuild,
  generate: runGenerate,
  shell: runShell,
  exec: runExec,
  plan: runPlan,
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2))

  if (args.version) {
    printVersion()
    process.exit(0)
  }

  if (args.help || !args.command) {
    printHelp()
    process.exit(args.help ? 0 : 1)
  }

  reporter.setVerbose(args.verbose ?? false)
  if (args.color === false) {
    reporter.setColorsEnabled(false)
  }

  const run = COMMANDS[args.command]
  if (!run) {
    reporter.printError(`Unknown command: ${args.command}`)
    printHelp()
    process.exit(1)
  }

  try {
    const exitCode = await run({
      cwd: process.cwd(),
      args: args.args,
      name: args.name,
      environment: {
        shellEnabled: isShellEnabled(process.env),
        shellRcPath: shellRcPath(os.homedir()),
      },
    })
    process.exit(exitCode)
  } catch (error) {
    reporter.printError(formatError(args.command, error))
    process.exit(1)
  }
}

void main()
