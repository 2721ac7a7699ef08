/**
 * Options shared by every command
 */

import type { EnvironmentOptions } from '../core/environment.js'

export interface CommandOptions {
  /** Directory the command was run from */
  cwd: string
  /** Positional arguments after the command name */
  args: string[]
  /** Image name for `build` */
  name?: string
  /** Collaborators and settings for the opened environment */
  environment: EnvironmentOptions
}
