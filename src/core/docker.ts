/**
 * Container image builds with `docker build`
 */

import { execa } from 'execa'
import type { BuildFlags, ContainerBuilder } from './types.js'
import { ContainerBuildError } from './errors.js'
import * as reporter from './reporter.js'

/**
 * Default image name when none is given
 */
export const DEFAULT_IMAGE_NAME = 'envbox'

/**
 * Arguments for `docker build`
 */
export function buildArgs(contextDir: string, flags: BuildFlags & { dockerfilePath: string }): string[] {
  const args = ['build', '-f', flags.dockerfilePath, '-t', flags.name || DEFAULT_IMAGE_NAME]

  for (const tag of flags.tags ?? []) {
    args.push('-t', tag)
  }

  args.push(contextDir)
  return args
}

/**
 * Builds images with the docker CLI
 */
export class DockerBuilder implements ContainerBuilder {
  async build(contextDir: string, flags: BuildFlags & { dockerfilePath: string }): Promise<void> {
    const args = buildArgs(contextDir, flags)
    reporter.printDebug(`Running command: docker ${args.join(' ')}`)

    const result = await execa('docker', args, {
      cwd: contextDir,
      stdio: 'inherit',
      reject: false,
      env: { DOCKER_BUILDKIT: '1' },
    })

    if (result.failed) {
      throw new ContainerBuildError(`docker build exited with status ${String(result.exitCode)}`)
    }
  }
}
