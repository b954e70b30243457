import type { PluginManifest } from './manifest.js'

export type PluginRecordState = 'uninstalled' | 'installed-disabled' | 'installed-enabled' | 'failed'

export interface PluginRecord {
  id: string
  /** Null when the manifest could not be loaded from disk. */
  manifest: PluginManifest | null
  state: PluginRecordState
  installedVersion: string
  lastAppliedAt: string | null
  /** Why the record is failed, when it is. */
  problem: string | null
}

export type RegistryError =
  | { code: 'BadManifest'; issues: string[] }
  | { code: 'DuplicateId'; id: string }
  | { code: 'FileCollision'; path: string; owner: string | null }
  | { code: 'KeyCollision'; key: string; owner: string }
  | { code: 'NotFound'; id: string }
  | { code: 'DependencyUnresolved'; id: string; requiredBy: string }
  | { code: 'MissingDependency'; id: string; requiredBy: string }
  | { code: 'CyclicDependency'; chain: string[] }
  | { code: 'VersionMismatch'; id: string; required: string; found: string; requiredBy: string }
  | { code: 'HasDependents'; dependents: string[] }
  | { code: 'HasEnabledDependents'; dependents: string[] }
  | { code: 'PluginUnavailable'; id: string; reason: string }

export type RegistryErrorCode = RegistryError['code']

type ErrorsOf<C extends RegistryErrorCode> = Extract<RegistryError, { code: C }>

export type InstallError = ErrorsOf<
  'BadManifest' | 'DuplicateId' | 'DependencyUnresolved' | 'VersionMismatch' | 'KeyCollision'
>

export type UpgradeError = ErrorsOf<
  'NotFound' | 'BadManifest' | 'DependencyUnresolved' | 'VersionMismatch' | 'KeyCollision'
>

export type UninstallError = ErrorsOf<'NotFound' | 'HasDependents'>

export type PlanError = ErrorsOf<
  | 'NotFound'
  | 'CyclicDependency'
  | 'MissingDependency'
  | 'VersionMismatch'
  | 'HasEnabledDependents'
  | 'PluginUnavailable'
>

export type RegistryResult<T, E extends RegistryError> =
  | { success: true; value: T }
  | { success: false; error: E }
