import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { extract } from 'tar'

import { createLogger } from '@scoreboard-hub/config'

import { checkRelativePath, findManifestInDir, parseManifest, type PluginManifest } from './manifest.js'

const logger = createLogger('PluginPackage')

export interface PackageFile {
  /** POSIX path relative to the package root. */
  path: string
  contents: Buffer
}

export interface PluginPackage {
  manifest: PluginManifest
  files: PackageFile[]
  /** Where the package was read from, for messages. */
  source: string
}

export type LoadPackageResult =
  | { success: true; package: PluginPackage }
  | { success: false; issues: string[] }

/** Entries never copied into an installed plugin. */
const SKIPPED_ENTRIES = new Set(['.git', 'node_modules', '.metadata.json'])

async function collectFiles(root: string): Promise<{ files: PackageFile[]; issues: string[] }> {
  const files: PackageFile[] = []
  const issues: string[] = []
  const pending = ['']

  while (pending.length > 0) {
    const relativeDir = pending.pop() ?? ''
    const entries = await fs.readdir(path.join(root, relativeDir), { withFileTypes: true })
    for (const entry of entries) {
      if (SKIPPED_ENTRIES.has(entry.name)) continue
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name
      if (entry.isDirectory()) {
        pending.push(relativePath)
      } else if (entry.isFile()) {
        files.push({ path: relativePath, contents: await fs.readFile(path.join(root, relativePath)) })
      } else {
        issues.push(`${relativePath}: only regular files and directories are supported`)
      }
    }
  }

  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
  return { files, issues }
}

/** Problems with a package's file list: unsafe paths, case-insensitive duplicates, a missing entry. */
export function checkPackageFiles(manifest: PluginManifest, files: readonly PackageFile[]): string[] {
  const issues: string[] = []
  const seen = new Map<string, string>()
  for (const file of files) {
    const problem = checkRelativePath(file.path)
    if (problem) {
      issues.push(`${file.path}: ${problem}`)
      continue
    }
    const folded = file.path.toLowerCase()
    const previous = seen.get(folded)
    if (previous !== undefined) {
      issues.push(`${file.path}: collides with ${previous}`)
      continue
    }
    seen.set(folded, file.path)
  }
  if (!files.some((file) => file.path === manifest.entry)) {
    issues.push(`entry: ${manifest.entry} is not part of the package`)
  }
  return issues
}

export async function readPackageDir(packageDir: string): Promise<LoadPackageResult> {
  const source = path.resolve(packageDir)
  let found: Awaited<ReturnType<typeof findManifestInDir>>
  try {
    found = await findManifestInDir(source)
  } catch (err) {
    return { success: false, issues: [`manifest: ${err instanceof Error ? err.message : String(err)}`] }
  }
  if (!found) {
    return {
      success: false,
      issues: [`manifest: no plugin.json or "scoreboard" key in package.json in ${source}`],
    }
  }

  const manifestSource = found.source
  const parsed = parseManifest(found.raw)
  if (!parsed.success) {
    return { success: false, issues: parsed.issues.map((issue) => `${manifestSource} ${issue}`) }
  }

  const { files, issues } = await collectFiles(source)
  issues.push(...checkPackageFiles(parsed.manifest, files))
  if (issues.length > 0) return { success: false, issues }

  return { success: true, package: { manifest: parsed.manifest, files, source } }
}

/**
 * Reads a gzipped tarball. npm-style archives keep everything under
 * `package/`; archives without that prefix are read from their root.
 */
export async function readPackageArchive(archivePath: string): Promise<LoadPackageResult> {
  const source = path.resolve(archivePath)
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scoreboard-plugin-'))
  try {
    try {
      await extract({ file: source, cwd: tmpDir, strict: true })
    } catch (err) {
      return {
        success: false,
        issues: [`archive: cannot extract ${source}: ${err instanceof Error ? err.message : String(err)}`],
      }
    }
    const nested = path.join(tmpDir, 'package')
    const root = (await isDirectory(nested)) ? nested : tmpDir
    const result = await readPackageDir(root)
    if (!result.success) return result
    return { success: true, package: { ...result.package, source } }
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true }).catch((err: unknown) => {
      logger.warn(`Failed to remove temporary directory ${tmpDir}`, {
        error: err instanceof Error ? err.message : String(err),
      })
    })
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory()
  } catch {
    return false
  }
}

const ARCHIVE_SUFFIXES = ['.tgz', '.tar.gz']

/** Loads a plugin package from a directory or a .tgz archive. */
export async function loadPluginPackage(source: string): Promise<LoadPackageResult> {
  let stats: Stats
  try {
    stats = await fs.stat(source)
  } catch {
    return { success: false, issues: [`source: ${path.resolve(source)} does not exist`] }
  }
  if (stats.isDirectory()) return readPackageDir(source)
  if (stats.isFile() && ARCHIVE_SUFFIXES.some((suffix) => source.toLowerCase().endsWith(suffix))) {
    return readPackageArchive(source)
  }
  return {
    success: false,
    issues: [`source: ${path.resolve(source)} is neither a directory nor a .tgz archive`],
  }
}
