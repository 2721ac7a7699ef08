import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import * as fs from 'node:fs'
import * as path from 'node:path'
import { Environment, GEN_DIR, PROFILE_DIR } from '@/core/environment.js'
import type { EnvironmentOptions } from '@/core/environment.js'
import { createPlan } from '@/core/plan.js'
import { createPlanner } from '@/planners/registry.js'
import type { Planner } from '@/planners/registry.js'
import { InstallError, PackageNotFoundError, PlanConflictError } from '@/core/errors.js'
import type {
  ContainerBuilder,
  PackageIndex,
  PackageInstaller,
  Plan,
  ShellLauncher,
} from '@/core/types.js'
import { createProject, removeProject } from '../fixtures/project.js'

vi.mock('@/core/reporter.js')

import * as reporter from '@/core/reporter.js'

const KNOWN_PACKAGES = ['git', 'go', 'nodejs', 'ripgrep']

function fakeIndex(): PackageIndex {
  return { exists: async (pkg) => KNOWN_PACKAGES.includes(pkg) }
}

// Detects a package.json and infers a node plan
function nodePlanner(overrides: Partial<Plan> = {}): Planner {
  return createPlanner('nodejs', {
    detect: (dir) => fs.existsSync(path.join(dir, 'package.json')),
    buildPlan: () =>
      createPlan({
        devPackages: ['nodejs'],
        runtimePackages: ['nodejs'],
        installStage: { command: ['npm install'] },
        startStage: { command: ['npm start'] },
        ...overrides,
      }),
  })
}

function readConfig(projectDir: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(projectDir, 'envbox.json'), 'utf-8'))
}

describe('Environment', () => {
  const projects: string[] = []
  let installer: { apply: Mock<Parameters<PackageInstaller['apply']>, Promise<void>> }
  let containerBuilder: { build: Mock<Parameters<ContainerBuilder['build']>, Promise<void>> }
  let shellLauncher: {
    run: Mock<Parameters<ShellLauncher['run']>, Promise<void>>
    exec: Mock<Parameters<ShellLauncher['exec']>, Promise<void>>
  }

  function project(files: Record<string, string> = {}): string {
    const dir = createProject({ 'envbox.json': JSON.stringify({ packages: ['git'] }), ...files })
    projects.push(dir)
    return dir
  }

  function open(dir: string, options: EnvironmentOptions = {}): Promise<Environment> {
    return Environment.open(dir, {
      planners: [nodePlanner()],
      packageIndex: fakeIndex(),
      installer,
      containerBuilder,
      shellLauncher,
      ...options,
    })
  }

  beforeEach(() => {
    vi.resetAllMocks()
    installer = { apply: vi.fn() }
    containerBuilder = { build: vi.fn() }
    shellLauncher = { run: vi.fn(), exec: vi.fn() }
  })

  afterEach(() => {
    projects.splice(0).forEach(removeProject)
  })

  describe('open', () => {
    it('should load the nearest config above the directory', async () => {
      const projectDir = project({ 'src/.keep': '' })

      const env = await open(path.join(projectDir, 'src'))

      expect(env.projectDir).toBe(projectDir)
      expect(env.configPath).toBe(path.join(projectDir, 'envbox.json'))
      expect(env.getConfig().packages).toEqual(['git'])
    })

    it('should start in the configured phase', async () => {
      const env = await open(project())

      expect(env.phase).toBe('configured')
    })
  })

  describe('add', () => {
    it('should declare and install a new package', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      const result = await env.add('go')

      expect(result).toEqual({ changed: ['go'], installed: true })
      expect(readConfig(projectDir)).toEqual({ packages: ['git', 'go'], shell: { init_hook: [] } })
      expect(installer.apply).toHaveBeenCalledWith(
        path.join(projectDir, PROFILE_DIR),
        path.join(projectDir, GEN_DIR, 'development.nix')
      )
      expect(env.phase).toBe('realized')
    })

    it('should render the new package into the shell files before installing', async () => {
      const projectDir = project()
      const env = await open(projectDir)
      let rendered = ''
      installer.apply.mockImplementation(async (_profileDir: string, derivationPath: string) => {
        rendered = fs.readFileSync(derivationPath, 'utf-8')
      })

      await env.add('ripgrep')

      expect(rendered).toContain('    git\n    ripgrep\n')
    })

    it('should not install when every package is already declared', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      const result = await env.add('git')

      expect(result).toEqual({ changed: [], installed: false })
      expect(installer.apply).not.toHaveBeenCalled()
      expect(readConfig(projectDir)).toEqual({ packages: ['git'], shell: { init_hook: [] } })
    })

    it('should leave the config unchanged when added twice', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      await env.add('go')
      await env.add('go')

      expect(env.getConfig().packages).toEqual(['git', 'go'])
      expect(installer.apply).toHaveBeenCalledTimes(1)
    })

    it('should collapse repeated arguments', async () => {
      const env = await open(project())

      await env.add('go', 'go', 'ripgrep')

      expect(env.getConfig().packages).toEqual(['git', 'go', 'ripgrep'])
    })

    it('should add nothing when any package is unknown', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      await expect(env.add('go', 'nonexistent-pkg')).rejects.toThrow(
        new PackageNotFoundError(['nonexistent-pkg'])
      )

      expect(env.getConfig().packages).toEqual(['git'])
      expect(readConfig(projectDir)).toEqual({ packages: ['git'] })
      expect(installer.apply).not.toHaveBeenCalled()
    })

    it('should keep unused config keys when saving', async () => {
      const projectDir = project({
        'envbox.json': JSON.stringify({ $schema: './envbox.schema.json', packages: ['git'] }),
      })
      const env = await open(projectDir)

      await env.add('go')

      expect(readConfig(projectDir)).toEqual({
        $schema: './envbox.schema.json',
        packages: ['git', 'go'],
        shell: { init_hook: [] },
      })
    })

    it('should report the update', async () => {
      const env = await open(project())

      await env.add('go')

      expect(reporter.printPackageUpdate).toHaveBeenCalledWith('install', ['go'], false)
    })

    it('should pass the shell flag to the update message', async () => {
      const env = await open(project(), { shellEnabled: true })

      await env.add('go')

      expect(reporter.printPackageUpdate).toHaveBeenCalledWith('install', ['go'], true)
    })

    it('should wrap installer failures in InstallError', async () => {
      const env = await open(project())
      installer.apply.mockRejectedValue(new Error('nix-env not found'))

      await expect(env.add('go')).rejects.toBeInstanceOf(InstallError)
    })

    it('should pass InstallError from the installer through', async () => {
      const env = await open(project())
      const failure = new InstallError('nix-env --install', 1, 'error: boom')
      installer.apply.mockRejectedValue(failure)

      await expect(env.add('go')).rejects.toBe(failure)
    })
  })

  describe('remove', () => {
    it('should remove a declared package and uninstall it', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      const result = await env.remove('git')

      expect(result).toEqual({ changed: ['git'], installed: true })
      expect(readConfig(projectDir)).toEqual({ packages: [], shell: { init_hook: [] } })
      expect(reporter.printInstalling).toHaveBeenCalledWith('uninstall')
    })

    it('should ignore packages that are not declared', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      const result = await env.remove('nonexistent-pkg')

      expect(result).toEqual({ changed: [], installed: false })
      expect(env.getConfig().packages).toEqual(['git'])
      expect(installer.apply).not.toHaveBeenCalled()
    })
  })

  describe('plans', () => {
    it('should add inferred packages but no stages to the shell plan', async () => {
      const env = await open(project({ 'package.json': '{}' }))

      const plan = env.shellPlan()

      expect(plan.devPackages).toEqual(['git', 'nodejs'])
      expect(plan.installStage.command).toEqual([])
      expect(plan.startStage.command).toEqual([])
      expect(env.phase).toBe('planned')
    })

    it('should build the shell plan even when the inferred plan has errors', async () => {
      const env = await open(project({ 'package.json': '{}' }), {
        planners: [nodePlanner({ errors: [{ message: 'broken' }] })],
      })

      expect(env.shellPlan().devPackages).toEqual(['git', 'nodejs'])
    })

    it('should merge inferred stages into the build plan', async () => {
      const env = await open(project({ 'package.json': '{}' }))

      const plan = env.buildPlan()

      expect(plan.installStage.command).toEqual(['npm install'])
      expect(plan.startStage.command).toEqual(['npm start'])
      expect(plan.source).toBe('nodejs')
    })

    it('should reject a build plan that conflicts with the config', async () => {
      const env = await open(project({ 'package.json': '{}' }), {
        planners: [nodePlanner({ errors: [{ message: 'broken' }] })],
      })

      expect(() => env.buildPlan()).toThrow(PlanConflictError)
    })
  })

  describe('generate', () => {
    it('should write each shell and build file once', async () => {
      const projectDir = project({ 'package.json': '{}' })
      const env = await open(projectDir)

      const files = env.generate()

      expect(files.map((file) => path.relative(projectDir, file))).toEqual([
        path.join(GEN_DIR, 'shell.nix'),
        path.join(GEN_DIR, 'development.nix'),
        path.join(GEN_DIR, 'shellrc'),
        path.join(GEN_DIR, 'runtime.nix'),
        path.join(GEN_DIR, 'Dockerfile'),
        path.join(GEN_DIR, 'Dockerfile.dockerignore'),
      ])
      expect(env.phase).toBe('generated')
    })

    it('should write no files when the build plan conflicts', async () => {
      const projectDir = project({ 'package.json': '{}' })
      const env = await open(projectDir, {
        planners: [nodePlanner({ errors: [{ message: 'broken' }] })],
      })

      expect(() => env.generate()).toThrow(PlanConflictError)
      expect(fs.existsSync(path.join(projectDir, GEN_DIR))).toBe(false)
    })

    it('should print plan warnings', async () => {
      const env = await open(project())

      env.generate()

      expect(reporter.printWarning).toHaveBeenCalledWith(
        'No supported project type detected; using the plan declared in envbox.json only'
      )
    })

    it('should copy the original shell init file into shellrc', async () => {
      const projectDir = project({ '.home/.bashrc': 'export EDITOR=vim\n' })
      const rcPath = path.join(projectDir, '.home', '.bashrc')
      const env = await open(projectDir, { shellRcPath: rcPath })

      env.generateShellFiles()

      const shellrc = fs.readFileSync(path.join(projectDir, GEN_DIR, 'shellrc'), 'utf-8')
      expect(shellrc).toContain(`# Begin ${rcPath}\n\nexport EDITOR=vim\n`)
    })

    it('should skip a missing shell init file', async () => {
      const projectDir = project()
      const env = await open(projectDir, { shellRcPath: path.join(projectDir, 'missing-rc') })

      env.generateShellFiles()

      const shellrc = fs.readFileSync(path.join(projectDir, GEN_DIR, 'shellrc'), 'utf-8')
      expect(shellrc).not.toContain('missing-rc')
    })
  })

  describe('build', () => {
    it('should build from the generated Dockerfile', async () => {
      const projectDir = project({ 'package.json': '{}' })
      const env = await open(projectDir)

      await env.build({ name: 'my-app', tags: ['my-app:1'] })

      expect(containerBuilder.build).toHaveBeenCalledWith(projectDir, {
        name: 'my-app',
        tags: ['my-app:1'],
        dockerfilePath: path.join(projectDir, GEN_DIR, 'Dockerfile'),
      })
      expect(fs.existsSync(path.join(projectDir, GEN_DIR, 'Dockerfile'))).toBe(true)
    })

    it('should use a Dockerfile passed in the flags', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      await env.build({ dockerfilePath: '/tmp/Custom.Dockerfile' })

      expect(containerBuilder.build).toHaveBeenCalledWith(projectDir, {
        dockerfilePath: '/tmp/Custom.Dockerfile',
      })
    })
  })

  describe('shell', () => {
    it('should install packages and start the shell', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      await env.shell()

      expect(installer.apply).toHaveBeenCalledTimes(1)
      expect(shellLauncher.run).toHaveBeenCalledWith({
        shellFilePath: path.join(projectDir, GEN_DIR, 'shell.nix'),
        rcFilePath: path.join(projectDir, GEN_DIR, 'shellrc'),
        projectDir,
      })
    })

    it('should not start the shell when installing fails', async () => {
      const env = await open(project())
      installer.apply.mockRejectedValue(new Error('boom'))

      await expect(env.shell()).rejects.toBeInstanceOf(InstallError)
      expect(shellLauncher.run).not.toHaveBeenCalled()
    })
  })

  describe('exec', () => {
    it('should run the command with the profile on PATH', async () => {
      const projectDir = project()
      const env = await open(projectDir)

      await env.exec('make', 'test')

      const binDir = path.join(projectDir, PROFILE_DIR, 'bin')
      expect(shellLauncher.exec).toHaveBeenCalledWith(path.join(projectDir, GEN_DIR, 'shell.nix'), [
        `PATH=${binDir}:$PATH`,
        'make',
        'test',
      ])
    })
  })
})
