import { describe, it, expect, afterEach } from 'vitest'
import { createPythonPlanner } from '@/builtin-planners/python/index.js'
import { createProject, removeProject } from '../fixtures/project.js'

describe('python planner', () => {
  const planner = createPythonPlanner()
  const projects: string[] = []

  function project(files: Record<string, string>): string {
    const dir = createProject(files)
    projects.push(dir)
    return dir
  }

  afterEach(() => {
    projects.splice(0).forEach(removeProject)
  })

  it('should detect requirements.txt', () => {
    expect(planner.detect(project({ 'requirements.txt': 'flask\n' }))).toBe(true)
    expect(planner.detect(project({ 'setup.py': '' }))).toBe(false)
  })

  it('should install into a virtualenv and run main.py', () => {
    const plan = planner.buildPlan(project({ 'requirements.txt': 'flask\n', 'main.py': '' }))

    expect(plan.devPackages).toEqual(['python3'])
    expect(plan.installStage.command).toEqual([
      'python3 -m venv .venv',
      '. .venv/bin/activate && pip install -r requirements.txt',
    ])
    expect(plan.buildStage.command).toEqual([])
    expect(plan.startStage.command).toEqual(['. .venv/bin/activate && python main.py'])
    expect(plan.shellInitHook).toBe('[ -f .venv/bin/activate ] && . .venv/bin/activate')
    expect(plan.errors).toEqual([])
  })

  it('should report a missing entrypoint against the start stage', () => {
    const plan = planner.buildPlan(project({ 'requirements.txt': '' }))

    expect(plan.startStage.command).toEqual([])
    expect(plan.errors).toEqual([
      { stage: 'start', message: 'no main.py found; declare a start_stage in envbox.json' },
    ])
  })
})
