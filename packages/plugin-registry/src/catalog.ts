import {
  buildDefaults,
  checkFieldSpecs,
  extendSchema,
  mergeMissing,
  unsetPath,
  type ConfigSchema,
  type ConfigSection,
  type PluginEntry,
} from '@scoreboard-hub/config-store'

import { isCompatibleVersion, type PluginManifest } from './manifest.js'
import { checkPackageFiles, type PluginPackage } from './package-source.js'
import {
  enabledDependents,
  planDisable,
  planEnable,
  type DependencyGraph,
  type DisablePlan,
  type EnablePlan,
  type PlannerNode,
} from './planner.js'
import type {
  InstallError,
  PlanError,
  PluginRecord,
  PluginRecordState,
  RegistryError,
  RegistryResult,
  UninstallError,
  UpgradeError,
} from './types.js'

export interface CatalogEntry {
  record: PluginEntry
  /** Manifest loaded from disk; null when it could not be. */
  manifest: PluginManifest | null
  problem: string | null
}

type ErrorOf<C extends RegistryError['code']> = Extract<RegistryError, { code: C }>

const BASE_OWNER = 'base schema'

function keysOverlap(a: string, b: string): boolean {
  return a === b || a.startsWith(`${b}.`) || b.startsWith(`${a}.`)
}

function entryState(entry: CatalogEntry): PluginRecordState {
  if (!entry.manifest || entry.record.state === 'failed') return 'failed'
  return entry.record.state === 'enabled' ? 'installed-enabled' : 'installed-disabled'
}

/**
 * In-memory view of the plugin section of a document, with the manifests
 * needed to plan transitions. Mutating methods change only this copy; the
 * orchestrator persists it through the config store.
 */
export class PluginCatalog implements DependencyGraph {
  readonly base: ConfigSchema
  private readonly entries: Map<string, CatalogEntry>

  constructor(base: ConfigSchema, entries: Iterable<[string, CatalogEntry]> = []) {
    this.base = base
    this.entries = new Map(entries)
  }

  clone(): PluginCatalog {
    const copies: Array<[string, CatalogEntry]> = [...this.entries].map(([id, entry]) => [
      id,
      { ...entry, record: { ...entry.record } },
    ])
    return new PluginCatalog(this.base, copies)
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  ids(): string[] {
    return [...this.entries.keys()].sort()
  }

  node(id: string): PlannerNode | undefined {
    const entry = this.entries.get(id)
    if (!entry) return undefined
    return {
      manifest: entry.manifest,
      enabled: entry.manifest !== null && entry.record.state === 'enabled',
      problem: entry.problem,
    }
  }

  record(id: string): PluginRecord | undefined {
    const entry = this.entries.get(id)
    if (!entry) return undefined
    return {
      id,
      manifest: entry.manifest,
      state: entryState(entry),
      installedVersion: entry.record.version,
      lastAppliedAt: entry.record.lastAppliedAt,
      problem: entry.problem,
    }
  }

  list(): PluginRecord[] {
    return this.ids().flatMap((id) => {
      const record = this.record(id)
      return record ? [record] : []
    })
  }

  /** The plugin section to persist, keyed in identifier order. */
  toSection(): Record<string, PluginEntry> {
    const section: Record<string, PluginEntry> = {}
    for (const id of this.ids()) {
      const entry = this.entries.get(id)
      if (entry) section[id] = { ...entry.record }
    }
    return section
  }

  enabledManifests(): PluginManifest[] {
    return this.ids().flatMap((id) => {
      const node = this.node(id)
      return node?.enabled && node.manifest ? [node.manifest] : []
    })
  }

  effectiveSchema(): ConfigSchema {
    return extendSchema(
      this.base,
      this.enabledManifests().map((manifest) => ({
        fields: manifest.config,
        boards: manifest.boards,
      }))
    )
  }

  boards(): string[] {
    return this.effectiveSchema().boards
  }

  install(pkg: PluginPackage, appliedAt: string): RegistryResult<PluginRecord, InstallError> {
    const { manifest } = pkg
    if (this.has(manifest.id)) {
      return { success: false, error: { code: 'DuplicateId', id: manifest.id } }
    }

    const issues = this.manifestIssues(pkg)
    if (issues.length > 0) return { success: false, error: { code: 'BadManifest', issues } }

    const dependencyError = this.checkDependencies(manifest, false)
    if (dependencyError) return { success: false, error: dependencyError }

    const collision = this.findCollision(manifest)
    if (collision) return { success: false, error: collision }

    this.entries.set(manifest.id, {
      record: { state: 'disabled', version: manifest.version, lastAppliedAt: appliedAt },
      manifest,
      problem: null,
    })
    return { success: true, value: this.requireRecord(manifest.id) }
  }

  /**
   * Replaces an installed plugin's manifest, keeping its state. An enabled
   * plugin gets the defaults of any newly contributed keys.
   */
  upgrade(
    pkg: PluginPackage,
    values: ConfigSection,
    appliedAt: string
  ): RegistryResult<{ record: PluginRecord; previousVersion: string }, UpgradeError> {
    const { manifest } = pkg
    const entry = this.entries.get(manifest.id)
    if (!entry) return { success: false, error: { code: 'NotFound', id: manifest.id } }

    const previousVersion = entry.record.version
    const issues = this.manifestIssues(pkg)
    if (manifest.version === previousVersion) {
      issues.push(`version: ${manifest.id}@${manifest.version} is already installed`)
    }
    if (issues.length > 0) return { success: false, error: { code: 'BadManifest', issues } }

    const dependencyError = this.checkDependencies(manifest, entry.record.state === 'enabled')
    if (dependencyError) return { success: false, error: dependencyError }

    for (const dependent of enabledDependents(this, manifest.id)) {
      const requirement = this.node(dependent)?.manifest?.dependencies.find(
        (dependency) => dependency.id === manifest.id
      )
      if (requirement && !isCompatibleVersion(manifest.version, requirement.minVersion)) {
        return {
          success: false,
          error: {
            code: 'VersionMismatch',
            id: manifest.id,
            required: requirement.minVersion,
            found: manifest.version,
            requiredBy: dependent,
          },
        }
      }
    }

    const collision = this.findCollision(manifest, manifest.id)
    if (collision) return { success: false, error: collision }

    const state = entry.record.state === 'failed' ? 'disabled' : entry.record.state
    this.entries.set(manifest.id, {
      record: { state, version: manifest.version, lastAppliedAt: appliedAt },
      manifest,
      problem: null,
    })
    if (state === 'enabled') mergeMissing(values, buildDefaults(manifest.config))
    return { success: true, value: { record: this.requireRecord(manifest.id), previousVersion } }
  }

  /**
   * Removes a plugin no enabled plugin depends on. Unless `keepConfig` is set,
   * the values of the keys it contributed are removed too.
   */
  uninstall(
    id: string,
    options: { keepConfig?: boolean },
    values: ConfigSection
  ): RegistryResult<{ record: PluginRecord; removedKeys: string[] }, UninstallError> {
    const record = this.record(id)
    if (!record) return { success: false, error: { code: 'NotFound', id } }

    const dependents = enabledDependents(this, id)
    if (dependents.length > 0) {
      return { success: false, error: { code: 'HasDependents', dependents } }
    }

    this.entries.delete(id)
    const removedKeys: string[] = []
    if (!options.keepConfig && record.manifest) {
      for (const field of record.manifest.config) {
        if (unsetPath(values, field.key)) removedKeys.push(field.key)
      }
    }
    return { success: true, value: { record, removedKeys } }
  }

  planEnable(id: string): RegistryResult<EnablePlan, PlanError> {
    return planEnable(this, id)
  }

  planDisable(id: string): RegistryResult<DisablePlan, PlanError> {
    return planDisable(this, id)
  }

  /** Marks every plugin in the plan enabled and merges its defaults where absent. */
  applyEnable(plan: EnablePlan, values: ConfigSection, appliedAt: string): void {
    for (const id of plan.toEnable) {
      const entry = this.entries.get(id)
      if (!entry?.manifest) {
        throw new Error(`Cannot enable ${id}: it is not in the catalog the plan was made from`)
      }
      entry.record = { ...entry.record, state: 'enabled', lastAppliedAt: appliedAt }
      mergeMissing(values, buildDefaults(entry.manifest.config))
    }
  }

  applyDisable(plan: DisablePlan, appliedAt: string): void {
    if (plan.alreadyDisabled) return
    const entry = this.entries.get(plan.id)
    if (!entry) {
      throw new Error(`Cannot disable ${plan.id}: it is not in the catalog the plan was made from`)
    }
    entry.record = { ...entry.record, state: 'disabled', lastAppliedAt: appliedAt }
  }

  private requireRecord(id: string): PluginRecord {
    const record = this.record(id)
    if (!record) throw new Error(`Plugin ${id} vanished from the catalog`)
    return record
  }

  private manifestIssues(pkg: PluginPackage): string[] {
    const { manifest } = pkg
    const issues = checkPackageFiles(manifest, pkg.files)

    for (const field of manifest.config) {
      const [head, owner] = field.key.split('.')
      if (head === 'plugins' && owner !== manifest.id) {
        issues.push(`config: ${field.key} is outside plugins.${manifest.id}`)
      }
    }

    const knownBoards = new Set([...this.base.boards, ...manifest.boards])
    for (const id of this.ids()) {
      for (const board of this.entries.get(id)?.manifest?.boards ?? []) knownBoards.add(board)
    }
    for (const problem of checkFieldSpecs(manifest.config, knownBoards)) {
      issues.push(`config: ${problem}`)
    }
    return issues
  }

  /**
   * Every dependency must be installed at a compatible version; when
   * `requireEnabled` is set it must also be enabled.
   */
  private checkDependencies(
    manifest: PluginManifest,
    requireEnabled: boolean
  ): ErrorOf<'DependencyUnresolved' | 'VersionMismatch'> | null {
    for (const dependency of manifest.dependencies) {
      const node = this.node(dependency.id)
      if (!node || !node.manifest || (requireEnabled && !node.enabled)) {
        return { code: 'DependencyUnresolved', id: dependency.id, requiredBy: manifest.id }
      }
      if (!isCompatibleVersion(node.manifest.version, dependency.minVersion)) {
        return {
          code: 'VersionMismatch',
          id: dependency.id,
          required: dependency.minVersion,
          found: node.manifest.version,
          requiredBy: manifest.id,
        }
      }
    }
    return null
  }

  private findCollision(
    manifest: PluginManifest,
    ignoreId?: string
  ): ErrorOf<'KeyCollision'> | null {
    const keyOwners: Array<[string, string]> = this.base.fields.map((field) => [
      field.key,
      BASE_OWNER,
    ])
    const boardOwners = new Map<string, string>(
      this.base.boards.map((board): [string, string] => [board, BASE_OWNER])
    )
    for (const id of this.ids()) {
      if (id === ignoreId) continue
      const other = this.entries.get(id)?.manifest
      if (!other) continue
      for (const field of other.config) keyOwners.push([field.key, id])
      for (const board of other.boards) boardOwners.set(board, id)
    }

    for (const field of manifest.config) {
      const clash = keyOwners.find(([key]) => keysOverlap(key, field.key))
      if (clash) return { code: 'KeyCollision', key: field.key, owner: clash[1] }
    }
    for (const board of manifest.boards) {
      const owner = boardOwners.get(board)
      if (owner) return { code: 'KeyCollision', key: `board:${board}`, owner }
    }
    return null
  }
}
