/**
 * Nix-backed package index, installer and shell launcher
 */

import { execa } from 'execa'
import type { PackageIndex, PackageInstaller, ShellLauncher, ShellRunOptions } from './types.js'
import { InstallError, ShellError } from './errors.js'
import { INTERACTIVE_SHELL } from './shell-env.js'
import * as reporter from './reporter.js'

/**
 * Looks packages up in <nixpkgs>
 */
export class NixPackageIndex implements PackageIndex {
  async exists(pkg: string): Promise<boolean> {
    const args = ['--eval', '<nixpkgs>', '-A', pkg]
    const command = ['nix-instantiate', ...args].join(' ')
    reporter.printDebug(`Running command: ${command}`)

    const result = await execa('nix-instantiate', args, { reject: false, stdio: 'pipe' })

    // No exit code: the command never ran
    if (typeof result.exitCode !== 'number') {
      throw new InstallError(
        command,
        undefined,
        result.stderr,
        new Error(result.stderr || 'command could not be started')
      )
    }

    return result.exitCode === 0
  }
}

/**
 * Installs a derivation into a profile with `nix-env`
 */
export class NixInstaller implements PackageInstaller {
  async apply(profileDir: string, derivationPath: string): Promise<void> {
    const args = ['--profile', profileDir, '--install', '-f', derivationPath]
    const command = ['nix-env', ...args].join(' ')
    reporter.printDebug(`Running command: ${command}`)

    const result = await execa('nix-env', args, { reject: false, all: true })

    if (result.failed) {
      const output = result.all ?? result.stderr
      throw new InstallError(
        command,
        typeof result.exitCode === 'number' ? result.exitCode : undefined,
        output,
        new Error(output || 'command could not be started')
      )
    }
  }
}

/**
 * Starts shells through `nix-shell`
 */
export class NixShellLauncher implements ShellLauncher {
  async run(options: ShellRunOptions): Promise<void> {
    const args = [options.shellFilePath, '--command', `${INTERACTIVE_SHELL} --rcfile ${options.rcFilePath}`]
    reporter.printDebug(`Running command: nix-shell ${args.join(' ')}`)

    const result = await execa('nix-shell', args, {
      cwd: options.projectDir,
      stdio: 'inherit',
      reject: false,
    })

    if (result.failed) {
      throw new ShellError(`nix-shell exited with status ${String(result.exitCode)}`)
    }
  }

  async exec(shellFilePath: string, commands: string[]): Promise<void> {
    const args = [shellFilePath, '--run', commands.join(' ')]
    reporter.printDebug(`Running command: nix-shell ${args.join(' ')}`)

    const result = await execa('nix-shell', args, { stdio: 'inherit', reject: false })

    if (result.failed) {
      throw new ShellError(`command exited with status ${String(result.exitCode)}`)
    }
  }
}
