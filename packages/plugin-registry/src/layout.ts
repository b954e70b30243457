import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { z } from 'zod'

import { createLogger, type Logger } from '@scoreboard-hub/config'
import {
  atomicWriteFile,
  computeBufferChecksum,
  isErrnoException,
} from '@scoreboard-hub/config-store'

import { parseManifest, validateNoPathTraversal, type PluginManifest } from './manifest.js'
import type { PluginPackage } from './package-source.js'

export const METADATA_FILE = '.metadata.json'

const installedFileSchema = z.object({ path: z.string(), sha256: z.string() })

const metadataSchema = z.object({
  pluginId: z.string(),
  version: z.string(),
  checksum: z.string(),
  files: z.array(installedFileSchema),
  installedAt: z.string(),
  source: z.string(),
  manifest: z.unknown(),
})

export type InstallMetadata = z.infer<typeof metadataSchema>

export type ManifestLoad =
  | { success: true; manifest: PluginManifest; metadata: InstallMetadata }
  | { success: false; problem: string }

/** Checksum over the sorted `(path, sha256)` pairs of a package. */
export function packageChecksum(files: ReadonlyArray<{ path: string; sha256: string }>): string {
  const lines = [...files]
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((file) => `${file.path}\0${file.sha256}\n`)
  return computeBufferChecksum(Buffer.from(lines.join(''), 'utf8'))
}

/**
 * On-disk plugin layout: `<pluginsDir>/<id>/<version>/` holds the package
 * files plus `.metadata.json` describing what was installed.
 */
export class PluginLayout {
  readonly pluginsDir: string
  private readonly logger: Logger

  constructor(pluginsDir: string, logger: Logger = createLogger('PluginLayout')) {
    this.pluginsDir = pluginsDir
    this.logger = logger
  }

  pluginDir(pluginId: string): string {
    const dir = path.join(this.pluginsDir, pluginId)
    validateNoPathTraversal(dir, this.pluginsDir)
    return dir
  }

  versionDir(pluginId: string, version: string): string {
    const dir = path.join(this.pluginDir(pluginId), version)
    validateNoPathTraversal(dir, this.pluginsDir)
    return dir
  }

  async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target)
      return true
    } catch {
      return false
    }
  }

  /** Writes the package into its version directory and returns that directory. */
  async writePackage(pkg: PluginPackage, installedAt: string): Promise<string> {
    const { manifest } = pkg
    const versionDir = this.versionDir(manifest.id, manifest.version)
    await fs.mkdir(versionDir, { recursive: true })

    const installed: Array<{ path: string; sha256: string }> = []
    for (const file of pkg.files) {
      const target = path.join(versionDir, file.path)
      validateNoPathTraversal(target, versionDir)
      await fs.mkdir(path.dirname(target), { recursive: true })
      await fs.writeFile(target, file.contents)
      installed.push({ path: file.path, sha256: computeBufferChecksum(file.contents) })
    }

    const metadata: InstallMetadata = {
      pluginId: manifest.id,
      version: manifest.version,
      checksum: packageChecksum(installed),
      files: installed,
      installedAt,
      source: pkg.source,
      manifest,
    }
    await atomicWriteFile(
      path.join(versionDir, METADATA_FILE),
      `${JSON.stringify(metadata, null, 2)}\n`
    )
    this.logger.debug(`Wrote ${installed.length} file(s) for ${manifest.id}@${manifest.version}`)
    return versionDir
  }

  async readMetadata(pluginId: string, version: string): Promise<InstallMetadata | null> {
    const file = path.join(this.versionDir(pluginId, version), METADATA_FILE)
    let raw: string
    try {
      raw = await fs.readFile(file, 'utf8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null
      throw err
    }
    const parsed = metadataSchema.safeParse(JSON.parse(raw))
    if (!parsed.success) {
      throw new Error(`${file} is not valid install metadata`)
    }
    return parsed.data
  }

  /** Loads the manifest recorded at install time for a plugin version. */
  async loadManifest(pluginId: string, version: string): Promise<ManifestLoad> {
    let metadata: InstallMetadata | null
    try {
      metadata = await this.readMetadata(pluginId, version)
    } catch (err) {
      return { success: false, problem: err instanceof Error ? err.message : String(err) }
    }
    if (!metadata) {
      return { success: false, problem: `files for ${pluginId}@${version} are missing` }
    }
    const parsed = parseManifest(metadata.manifest)
    if (!parsed.success) {
      return { success: false, problem: `stored manifest is invalid: ${parsed.issues.join('; ')}` }
    }
    if (parsed.manifest.id !== pluginId || parsed.manifest.version !== version) {
      return {
        success: false,
        problem: `stored manifest declares ${parsed.manifest.id}@${parsed.manifest.version}`,
      }
    }
    return { success: true, manifest: parsed.manifest, metadata }
  }

  /** Files that are missing or differ from what was installed. */
  async verifyFiles(pluginId: string, version: string): Promise<string[]> {
    const loaded = await this.loadManifest(pluginId, version)
    if (!loaded.success) return [loaded.problem]
    const versionDir = this.versionDir(pluginId, version)
    const problems: string[] = []
    for (const file of loaded.metadata.files) {
      let contents: Buffer
      try {
        contents = await fs.readFile(path.join(versionDir, file.path))
      } catch {
        problems.push(`${file.path}: missing`)
        continue
      }
      if (computeBufferChecksum(contents) !== file.sha256) {
        problems.push(`${file.path}: modified since install`)
      }
    }
    return problems
  }

  async removeVersion(pluginId: string, version: string): Promise<void> {
    await fs.rm(this.versionDir(pluginId, version), { recursive: true, force: true })
    await this.removeIfEmpty(pluginId)
  }

  async removePlugin(pluginId: string): Promise<void> {
    await fs.rm(this.pluginDir(pluginId), { recursive: true, force: true })
  }

  async removeIfEmpty(pluginId: string): Promise<void> {
    const dir = this.pluginDir(pluginId)
    try {
      const entries = await fs.readdir(dir)
      if (entries.length === 0) await fs.rmdir(dir)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return
      throw err
    }
  }

  /** Plugin directories on disk, mapped to the version directories they hold. */
  async listOnDisk(): Promise<Map<string, string[]>> {
    const found = new Map<string, string[]>()
    let plugins: string[]
    try {
      plugins = (await fs.readdir(this.pluginsDir, { withFileTypes: true }))
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return found
      throw err
    }
    for (const pluginId of plugins.sort()) {
      const versions = (await fs.readdir(path.join(this.pluginsDir, pluginId), { withFileTypes: true }))
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort()
      found.set(pluginId, versions)
    }
    return found
  }
}
