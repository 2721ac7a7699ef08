import { describe, it, expect, afterEach } from 'vitest'
import { createRubyPlanner } from '@/builtin-planners/ruby/index.js'
import { createProject, removeProject } from '../fixtures/project.js'

describe('ruby planner', () => {
  const planner = createRubyPlanner()
  const projects: string[] = []

  function project(files: Record<string, string>): string {
    const dir = createProject(files)
    projects.push(dir)
    return dir
  }

  afterEach(() => {
    projects.splice(0).forEach(removeProject)
  })

  it('should detect a Gemfile', () => {
    expect(planner.detect(project({ Gemfile: "source 'https://rubygems.org'\n" }))).toBe(true)
    expect(planner.detect(project({ 'Rakefile': '' }))).toBe(false)
  })

  it('should run a rack app', () => {
    const plan = planner.buildPlan(project({ Gemfile: '', 'config.ru': 'run App' }))

    expect(plan.devPackages).toEqual(['ruby', 'bundler'])
    expect(plan.installStage.command).toEqual(['bundle install'])
    expect(plan.startStage.command).toEqual(['bundle exec rackup'])
    expect(plan.errors).toEqual([])
  })

  it('should report a missing config.ru against the start stage', () => {
    const plan = planner.buildPlan(project({ Gemfile: '' }))

    expect(plan.errors).toEqual([
      { stage: 'start', message: 'no config.ru found; declare a start_stage in envbox.json' },
    ])
  })
})
