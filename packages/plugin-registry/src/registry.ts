import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { createLogger, type Logger } from '@scoreboard-hub/config'
import type { ConfigDocument, ConfigSchema, ConfigStore } from '@scoreboard-hub/config-store'

import { PluginCatalog, type CatalogEntry } from './catalog.js'
import {
  mergeListings,
  readCatalogIndex,
  type CatalogIndexEntry,
  type PluginListing,
} from './catalog-index.js'
import type { PluginLayout } from './layout.js'
import type { PluginManifest } from './manifest.js'
import type { PluginPackage } from './package-source.js'
import type { PluginRecord, RegistryError } from './types.js'

export interface PluginRegistryOptions {
  store: ConfigStore
  layout: PluginLayout
  baseSchema: ConfigSchema
  /** Optional plugin index file; null disables index lookups. */
  catalogIndexFile: string | null
  logger?: Logger
}

export interface BoardInfo {
  name: string
  label: string
  /** `built-in` or the id of the plugin contributing the board. */
  source: string
}

export interface AuditReport {
  /** Plugin directories no record refers to. */
  orphanDirectories: string[]
  /** Version directories left next to the one a record refers to. */
  strayVersions: string[]
  /** Records whose installed files are missing or modified. */
  damaged: Array<{ id: string; version: string; problems: string[] }>
}

export function boardLabel(name: string): string {
  return name
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

/**
 * Plugin records live in the canonical document; plugin files live in the
 * layout. The registry joins the two and never writes the document itself.
 */
export class PluginRegistry {
  readonly layout: PluginLayout
  private readonly store: ConfigStore
  private readonly baseSchema: ConfigSchema
  private readonly catalogIndexFile: string | null
  private readonly logger: Logger

  constructor(options: PluginRegistryOptions) {
    this.store = options.store
    this.layout = options.layout
    this.baseSchema = options.baseSchema
    this.catalogIndexFile = options.catalogIndexFile
    this.logger = options.logger ?? createLogger('PluginRegistry')
  }

  /** Canonical plugin records. Never waits on a transaction. */
  async list(): Promise<PluginRecord[]> {
    return (await this.catalog(await this.store.read())).list()
  }

  /** Builds a catalog for the records in `document`, loading manifests from disk. */
  async catalog(document: ConfigDocument): Promise<PluginCatalog> {
    const entries: Array<[string, CatalogEntry]> = []
    for (const [id, record] of Object.entries(document.plugins)) {
      const loaded = await this.layout.loadManifest(id, record.version)
      if (!loaded.success) {
        this.logger.warn(`Plugin ${id}@${record.version} is unavailable: ${loaded.problem}`)
      }
      entries.push([
        id,
        {
          record: { ...record },
          manifest: loaded.success ? loaded.manifest : null,
          problem: loaded.success ? null : loaded.problem,
        },
      ])
    }
    return new PluginCatalog(this.baseSchema, entries)
  }

  /**
   * Files of `manifest` would land on a directory the catalog does not own:
   * a leftover version directory, an unregistered plugin directory, or one
   * whose name differs from the id only by case.
   */
  async checkFileCollision(
    manifest: PluginManifest,
    catalog: PluginCatalog
  ): Promise<Extract<RegistryError, { code: 'FileCollision' }> | null> {
    const versionDir = this.layout.versionDir(manifest.id, manifest.version)
    if (await this.layout.exists(versionDir)) {
      return {
        code: 'FileCollision',
        path: versionDir,
        owner: catalog.has(manifest.id) ? manifest.id : null,
      }
    }

    const onDisk = await this.layout.listOnDisk()
    for (const name of onDisk.keys()) {
      if (name === manifest.id && !catalog.has(manifest.id)) {
        return { code: 'FileCollision', path: this.layout.pluginDir(name), owner: null }
      }
      if (name !== manifest.id && name.toLowerCase() === manifest.id.toLowerCase()) {
        return {
          code: 'FileCollision',
          path: this.layout.pluginDir(name),
          owner: catalog.has(name) ? name : null,
        }
      }
    }
    return null
  }

  /** Writes a package's files. The scoreboard sees them once the runtime view refers to them. */
  async stageFiles(pkg: PluginPackage, installedAt: string): Promise<string> {
    return this.layout.writePackage(pkg, installedAt)
  }

  /** Removes version directories written by `stageFiles`, and plugin directories they leave empty. */
  async discardStagedFiles(versionDirs: readonly string[]): Promise<void> {
    const failures: string[] = []
    for (const dir of versionDirs) {
      try {
        await fs.rm(dir, { recursive: true, force: true })
        await this.layout.removeIfEmpty(path.basename(path.dirname(dir)))
      } catch (err) {
        failures.push(`${dir}: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
    if (failures.length > 0) {
      throw new Error(`Failed to remove staged plugin files: ${failures.join('; ')}`)
    }
  }

  async removePluginFiles(pluginId: string): Promise<void> {
    await this.layout.removePlugin(pluginId)
    this.logger.info(`Removed files of plugin ${pluginId}`)
  }

  async removePluginVersion(pluginId: string, version: string): Promise<void> {
    await this.layout.removeVersion(pluginId, version)
    this.logger.info(`Removed superseded files of ${pluginId}@${version}`)
  }

  /** Compares the records of `document` with what is on disk. */
  async audit(document: ConfigDocument): Promise<AuditReport> {
    const onDisk = await this.layout.listOnDisk()
    const report: AuditReport = { orphanDirectories: [], strayVersions: [], damaged: [] }

    for (const [id, versions] of onDisk) {
      const record = document.plugins[id]
      if (!record) {
        report.orphanDirectories.push(this.layout.pluginDir(id))
        continue
      }
      for (const version of versions) {
        if (version !== record.version) {
          report.strayVersions.push(this.layout.versionDir(id, version))
        }
      }
    }

    for (const [id, record] of Object.entries(document.plugins).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    )) {
      const problems = await this.layout.verifyFiles(id, record.version)
      if (problems.length > 0) report.damaged.push({ id, version: record.version, problems })
    }
    return report
  }

  async readCatalogIndex(): Promise<CatalogIndexEntry[]> {
    if (!this.catalogIndexFile) return []
    return readCatalogIndex(this.catalogIndexFile)
  }

  /** Records of `document` merged with the plugin index. */
  async listings(document: ConfigDocument): Promise<PluginListing[]> {
    const records = (await this.catalog(document)).list()
    let index: CatalogIndexEntry[] = []
    try {
      index = await this.readCatalogIndex()
    } catch (err) {
      this.logger.warn(
        `Ignoring plugin index: ${err instanceof Error ? err.message : String(err)}`
      )
    }
    return mergeListings(records, index)
  }

  /** Built-in boards followed by the boards of enabled plugins. */
  async listBoards(document: ConfigDocument): Promise<BoardInfo[]> {
    const catalog = await this.catalog(document)
    const boards: BoardInfo[] = this.baseSchema.boards.map((name) => ({
      name,
      label: boardLabel(name),
      source: 'built-in',
    }))
    for (const manifest of catalog.enabledManifests()) {
      for (const name of manifest.boards) {
        boards.push({ name, label: boardLabel(name), source: manifest.id })
      }
    }
    return boards
  }
}
