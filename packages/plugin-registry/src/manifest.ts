import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import semver from 'semver'
import { z } from 'zod'

import { fieldSpecSchema, isErrnoException, type ConfigFieldSpec } from '@scoreboard-hub/config-store'

export const PLUGIN_ID_PATTERN = /^[a-z][a-z0-9_-]*$/
const BOARD_NAME_PATTERN = /^[a-z][a-z0-9_]*$/

export interface PluginDependency {
  id: string
  /** Lowest acceptable version; anything with the same major at or above it satisfies. */
  minVersion: string
}

export interface PluginManifest {
  id: string
  version: string
  name: string | null
  description: string | null
  /** Module the scoreboard loads, relative to the plugin's version directory. */
  entry: string
  dependencies: PluginDependency[]
  config: ConfigFieldSpec[]
  boards: string[]
}

const semverString = z.string().refine((value) => semver.valid(value) === value, {
  message: 'must be a semantic version such as 1.2.0',
})

const pluginId = z
  .string()
  .regex(PLUGIN_ID_PATTERN, 'must start with a lowercase letter and use only a-z, 0-9, _ or -')

export const manifestSchema = z.object({
  id: pluginId,
  version: semverString,
  name: z.string().min(1).nullish(),
  description: z.string().nullish(),
  entry: z.string().min(1),
  dependencies: z.array(z.object({ id: pluginId, minVersion: semverString })).default([]),
  config: z.array(fieldSpecSchema).default([]),
  boards: z
    .array(z.string().regex(BOARD_NAME_PATTERN, 'must be a lowercase board name'))
    .default([]),
})

export type ManifestResult =
  | { success: true; manifest: PluginManifest }
  | { success: false; issues: string[] }

/**
 * Reason a package-relative path is unacceptable, or null. Paths are POSIX,
 * relative, and may not climb out of the plugin directory.
 */
export function checkRelativePath(relativePath: string): string | null {
  if (relativePath.length === 0) return 'must not be empty'
  if (relativePath.includes('\\')) return 'must use forward slashes'
  if (path.posix.isAbsolute(relativePath)) return 'must be a relative path'
  const normalized = path.posix.normalize(relativePath)
  if (normalized === '..' || normalized.startsWith('../')) return 'escapes the plugin directory'
  return null
}

/**
 * Ensure a path does not escape outside the allowed root directory.
 * Throws if the resolved path is outside the root.
 */
export function validateNoPathTraversal(targetPath: string, rootPath: string): void {
  const resolvedTarget = path.resolve(targetPath)
  const resolvedRoot = path.resolve(rootPath)

  if (!resolvedTarget.startsWith(resolvedRoot + path.sep) && resolvedTarget !== resolvedRoot) {
    throw new Error(`Path traversal detected: "${targetPath}" escapes root "${rootPath}"`)
  }
}

export function parseManifest(raw: unknown): ManifestResult {
  const result = manifestSchema.safeParse(raw)
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(manifest)'}: ${issue.message}`
      ),
    }
  }

  const data = result.data
  const issues: string[] = []

  const entryProblem = checkRelativePath(data.entry)
  if (entryProblem) issues.push(`entry: ${entryProblem}`)

  const dependencyIds = new Set<string>()
  for (const dependency of data.dependencies) {
    if (dependency.id === data.id) issues.push(`dependencies: "${data.id}" depends on itself`)
    if (dependencyIds.has(dependency.id)) {
      issues.push(`dependencies: "${dependency.id}" is listed more than once`)
    }
    dependencyIds.add(dependency.id)
  }

  const boards = new Set<string>()
  for (const board of data.boards) {
    if (boards.has(board)) issues.push(`boards: "${board}" is listed more than once`)
    boards.add(board)
  }

  if (issues.length > 0) return { success: false, issues }

  return {
    success: true,
    manifest: {
      id: data.id,
      version: data.version,
      name: data.name ?? null,
      description: data.description ?? null,
      entry: path.posix.normalize(data.entry),
      dependencies: data.dependencies,
      config: data.config,
      boards: data.boards,
    },
  }
}

/**
 * True when `found` satisfies a dependency on `required`: same major version
 * and not older.
 */
export function isCompatibleVersion(found: string, required: string): boolean {
  const foundVersion = semver.parse(found)
  const requiredVersion = semver.parse(required)
  if (!foundVersion || !requiredVersion) return false
  return foundVersion.major === requiredVersion.major && semver.gte(foundVersion, requiredVersion)
}

async function readJsonRecord(file: string): Promise<Record<string, unknown> | null> {
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf-8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null
    throw err
  }
  const parsed: unknown = JSON.parse(raw)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${path.basename(file)} must contain a JSON object`)
  }
  return Object.fromEntries(Object.entries(parsed))
}

export const MANIFEST_FILE = 'plugin.json'
export const PACKAGE_JSON_KEY = 'scoreboard'

/**
 * Find the raw manifest of an unpacked package directory. Checks plugin.json
 * first, then a "scoreboard" key in package.json. A missing version (and
 * description) is backfilled from package.json.
 */
export async function findManifestInDir(
  packageDir: string
): Promise<{ raw: Record<string, unknown>; source: string } | null> {
  const pkg = await readJsonRecord(path.join(packageDir, 'package.json'))

  let raw = await readJsonRecord(path.join(packageDir, MANIFEST_FILE))
  let source = MANIFEST_FILE
  if (!raw && pkg) {
    const embedded = pkg[PACKAGE_JSON_KEY]
    if (typeof embedded === 'object' && embedded !== null && !Array.isArray(embedded)) {
      raw = Object.fromEntries(Object.entries(embedded))
      source = `package.json#${PACKAGE_JSON_KEY}`
    }
  }
  if (!raw) return null

  if (raw.version === undefined && pkg && typeof pkg.version === 'string') {
    raw.version = pkg.version
  }
  if (raw.description === undefined && pkg && typeof pkg.description === 'string') {
    raw.description = pkg.description
  }
  return { raw, source }
}
