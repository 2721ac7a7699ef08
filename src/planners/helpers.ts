/**
 * Read-only filesystem helpers for planners
 *
 * Every helper treats a missing directory or file as "not there" rather
 * than failing.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'

/**
 * Check whether `name` exists inside `dir`
 */
export function hasFile(dir: string, name: string): boolean {
  return fs.existsSync(path.join(dir, name))
}

/**
 * Read a text file inside `dir`, or null when it cannot be read
 */
export function readText(dir: string, name: string): string | null {
  try {
    return fs.readFileSync(path.join(dir, name), 'utf-8')
  } catch {
    return null
  }
}

/**
 * Result of reading a JSON file
 */
export type JsonReadResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string }

/**
 * Read and parse a JSON file inside `dir`
 */
export function readJson(dir: string, name: string): JsonReadResult {
  const text = readText(dir, name)
  if (text === null) {
    return { ok: false, error: `${name} could not be read` }
  }

  try {
    return { ok: true, value: JSON.parse(text) }
  } catch (error) {
    return {
      ok: false,
      error: `${name} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    }
  }
}

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
