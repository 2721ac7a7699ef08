/**
 * Terminal output formatting for envbox
 */

import type { InstallMode, Plan } from './types.js'
import { STAGES } from './plan.js'

// =============================================================================
// ANSI Colors
// =============================================================================

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
}

// Symbols
const symbols = {
  check: `${colors.green}✓${colors.reset}`,
  warning: `${colors.yellow}⚠${colors.reset}`,
  error: `${colors.red}✗${colors.reset}`,
  info: `${colors.cyan}ℹ${colors.reset}`,
}

// =============================================================================
// Output Control
// =============================================================================

let colorsEnabled = !process.env.NO_COLOR
let verbose = false

/**
 * Set whether colors are enabled
 */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled
}

/**
 * Set whether debug output is printed
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled
}

/**
 * Get a color code (or empty string if colors disabled)
 */
function c(color: keyof typeof colors): string {
  return colorsEnabled ? colors[color] : ''
}

/**
 * Get a symbol (with or without colors)
 */
function s(symbol: keyof typeof symbols): string {
  if (!colorsEnabled) {
    switch (symbol) {
      case 'check':
        return '✓'
      case 'warning':
        return '⚠'
      case 'error':
        return '✗'
      case 'info':
        return 'ℹ'
    }
  }
  return symbols[symbol]
}

// =============================================================================
// Messages
// =============================================================================

/**
 * Print a success message
 */
export function printSuccess(message: string): void {
  console.log(`${s('check')} ${message}`)
}

/**
 * Print a warning
 */
export function printWarning(message: string): void {
  console.log(`${s('warning')} ${c('yellow')}${message}${c('reset')}`)
}

/**
 * Print an error
 */
export function printError(message: string): void {
  console.error(`${s('error')} ${c('red')}${message}${c('reset')}`)
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(`${s('info')} ${message}`)
}

/**
 * Print a debug message (verbose mode only)
 */
export function printDebug(message: string): void {
  if (verbose) {
    console.error(`${c('dim')}[debug] ${message}${c('reset')}`)
  }
}

// =============================================================================
// Packages
// =============================================================================

/**
 * Print the progress line shown before the installer runs
 */
export function printInstalling(mode: InstallMode): void {
  const verb = mode === 'install' ? 'Installing' : 'Uninstalling'
  printInfo(`${verb} nix packages. This may take a while...`)
}

/**
 * Build the message reported after packages are added or removed
 */
export function packageUpdateMessage(mode: InstallMode, pkgs: string[], inShell: boolean): string {
  const verb = mode === 'install' ? 'installed' : 'removed'
  const message =
    pkgs.length === 1 ? `${pkgs[0]} is now ${verb}.` : `${pkgs.join(', ')} are now ${verb}.`

  return inShell ? `${message} Run \`hash -r\` to ensure your shell is updated.` : message
}

/**
 * Print the message reported after packages are added or removed
 */
export function printPackageUpdate(mode: InstallMode, pkgs: string[], inShell: boolean): void {
  if (pkgs.length === 0) {
    return
  }
  printSuccess(packageUpdateMessage(mode, pkgs, inShell))
}

// =============================================================================
// Plan
// =============================================================================

function formatList(values: string[]): string {
  return values.length > 0 ? values.join(', ') : `${c('dim')}(none)${c('reset')}`
}

/**
 * Print a plan in human-readable form
 */
export function printPlan(plan: Plan): void {
  console.log(`${c('bright')}Plan${c('reset')}${plan.source ? ` ${c('dim')}(${plan.source})${c('reset')}` : ''}`)
  console.log(`  dev packages:     ${formatList(plan.devPackages)}`)
  console.log(`  runtime packages: ${formatList(plan.runtimePackages)}`)

  for (const { name, field } of STAGES) {
    const commands = plan[field].command
    console.log(`  ${c('cyan')}${name}${c('reset')}:`)
    if (commands.length === 0) {
      console.log(`    ${c('dim')}(absent)${c('reset')}`)
    }
    for (const command of commands) {
      console.log(`    ${command}`)
    }
  }

  console.log('')
}

/**
 * Print the files written by a generate step
 */
export function printGenerated(files: string[]): void {
  for (const file of files) {
    printDebug(`wrote ${file}`)
  }
}
