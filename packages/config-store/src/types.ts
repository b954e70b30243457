export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue }

export type ConfigSection = { [key: string]: ConfigValue }

/** Persisted plugin state. Absence from the section means uninstalled. */
export type PluginState = 'disabled' | 'enabled' | 'failed'

export interface PluginEntry {
  state: PluginState
  version: string
  lastAppliedAt: string | null
}

export interface ConfigDocument {
  revision: number
  values: ConfigSection
  plugins: Record<string, PluginEntry>
}

export const FIELD_TYPES = [
  'string',
  'integer',
  'number',
  'boolean',
  'string-list',
  'board-list',
] as const

export type FieldType = (typeof FIELD_TYPES)[number]

export interface ConfigFieldSpec {
  /** Dotted path into `values`, e.g. `preferences.live_game_refresh_rate`. */
  key: string
  type: FieldType
  required?: boolean
  default?: ConfigValue
  enum?: string[]
  min?: number
  max?: number
  pattern?: string
  description?: string
}

export interface ConfigSchema {
  fields: ConfigFieldSpec[]
  /** Board names that `board-list` fields may reference. */
  boards: string[]
}

export interface FieldError {
  field: string
  reason: string
}

export type ValidationResult = { valid: true } | { valid: false; errors: FieldError[] }
