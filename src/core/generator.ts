/**
 * Rendering plans into shell and build files
 *
 * Every call rewrites the whole template set. The first template that fails
 * stops the run; files already written by that call stay in place.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import Handlebars from 'handlebars'
import type { GenerationContext, TemplateSet } from './types.js'
import { GenerationError } from './errors.js'

// =============================================================================
// Template Sets
// =============================================================================

/**
 * Files that define the development shell
 */
export const SHELL_FILES: TemplateSet = {
  'shell/shell.nix': 'shell.nix',
  'development.nix': 'development.nix',
  'shell/shellrc': 'shellrc',
}

/**
 * Files consumed by the container build.
 *
 * `development.nix` is shared with the shell files.
 */
export const BUILD_FILES: TemplateSet = {
  'development.nix': 'development.nix',
  'build/runtime.nix': 'runtime.nix',
  'build/Dockerfile': 'Dockerfile',
  'build/dockerignore': 'Dockerfile.dockerignore',
}

const TEMPLATE_EXTENSION = '.hbs'

// =============================================================================
// Template Loading
// =============================================================================

const TEMPLATE_CACHE = new Map<string, Handlebars.TemplateDelegate>()

// Walk upward until we find the package root so built files resolve templates too
function findPackageRoot(startDir: string): string {
  let current = startDir

  while (true) {
    if (fs.existsSync(path.join(current, 'package.json'))) {
      return current
    }

    const parent = path.dirname(current)
    if (parent === current) {
      throw new Error(`package.json not found above ${startDir}`)
    }
    current = parent
  }
}

/**
 * Directory holding the bundled templates
 */
export function defaultTemplatesDir(): string {
  const here = fileURLToPath(new URL('.', import.meta.url))
  return path.join(findPackageRoot(here), 'templates')
}

function loadTemplate(templatesDir: string, name: string): Handlebars.TemplateDelegate {
  const templatePath = path.join(templatesDir, name + TEMPLATE_EXTENSION)
  const cached = TEMPLATE_CACHE.get(templatePath)
  if (cached) {
    return cached
  }

  const raw = fs.readFileSync(templatePath, 'utf-8')
  const compiled = Handlebars.compile(raw, { noEscape: true, strict: true })

  TEMPLATE_CACHE.set(templatePath, compiled)
  return compiled
}

/**
 * Templates of `templates` that are not in `exclude`
 */
export function withoutTemplates(templates: TemplateSet, exclude: TemplateSet): TemplateSet {
  return Object.fromEntries(Object.entries(templates).filter(([name]) => !(name in exclude)))
}

/**
 * Drop compiled templates (templates are cached per path)
 */
export function clearTemplateCache(): void {
  TEMPLATE_CACHE.clear()
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Values derived from the context that templates cannot compute themselves
 */
function templateData(context: GenerationContext): Record<string, unknown> {
  const start = context.plan.startStage.command
  return {
    ...context,
    startCommand: start.length > 0 ? JSON.stringify(start.join(' && ')) : '',
  }
}

/**
 * Render one template
 */
export function renderTemplate(
  name: string,
  context: GenerationContext,
  templatesDir: string = defaultTemplatesDir()
): string {
  const template = loadTemplate(templatesDir, name)
  return template(templateData(context))
}

/**
 * Generation options
 */
export interface GenerateOptions {
  /** Directory holding the `.hbs` templates */
  templatesDir?: string
}

/**
 * Render every template of `templates` into `targetDir`
 *
 * @returns paths of the written files, in template order
 * @throws GenerationError naming the template that failed
 */
export function generate(
  targetDir: string,
  context: GenerationContext,
  templates: TemplateSet,
  options: GenerateOptions = {}
): string[] {
  const templatesDir = options.templatesDir ?? defaultTemplatesDir()
  const written: string[] = []

  try {
    fs.mkdirSync(targetDir, { recursive: true })
  } catch (error) {
    throw new GenerationError(Object.keys(templates)[0] ?? '(none)', error)
  }

  for (const [name, output] of Object.entries(templates)) {
    const outputPath = path.join(targetDir, output)

    try {
      const content = renderTemplate(name, context, templatesDir)
      fs.mkdirSync(path.dirname(outputPath), { recursive: true })
      fs.writeFileSync(outputPath, content)
    } catch (error) {
      throw new GenerationError(name, error)
    }

    written.push(outputPath)
  }

  return written
}
