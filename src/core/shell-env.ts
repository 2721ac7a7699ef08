/**
 * Reading shell settings from the process environment
 *
 * Only the CLI calls these functions; everything else receives the values
 * explicitly.
 */

import * as path from 'node:path'

/**
 * Variable set inside envbox shells
 */
export const SHELL_ENABLED_VAR = 'ENVBOX_SHELL_ENABLED'

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True'])

/**
 * Whether the environment says we are inside an envbox shell
 */
export function isShellEnabled(env: NodeJS.ProcessEnv): boolean {
  const value = env[SHELL_ENABLED_VAR]
  return value !== undefined && TRUE_VALUES.has(value)
}

/**
 * Shell started by `envbox shell`
 */
export const INTERACTIVE_SHELL = 'bash'

/**
 * Init file copied into the generated shellrc.
 *
 * Always the init file of {@link INTERACTIVE_SHELL}, whatever the user's
 * login shell is.
 */
export function shellRcPath(homeDir: string): string {
  return path.join(homeDir, `.${INTERACTIVE_SHELL}rc`)
}
