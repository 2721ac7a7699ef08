import { vi } from 'vitest'
import type { EnvironmentOptions } from '@/core/environment.js'

/**
 * Environment options whose external tools are all fakes
 */
export function fakeEnvironment(known: string[] = ['git', 'go', 'ripgrep']) {
  const installer = { apply: vi.fn(async (_profileDir: string, _derivationPath: string) => undefined) }
  const containerBuilder = { build: vi.fn(async () => undefined) }
  const shellLauncher = {
    run: vi.fn(async () => undefined),
    exec: vi.fn(async (_shellFilePath: string, _commands: string[]) => undefined),
  }

  const options: EnvironmentOptions = {
    planners: [],
    packageIndex: { exists: async (pkg) => known.includes(pkg) },
    installer,
    containerBuilder,
    shellLauncher,
  }

  return { options, installer, containerBuilder, shellLauncher }
}
