import { z } from 'zod'

import type { ConfigDocument, ConfigSection, ConfigValue, PluginEntry } from './types.js'

export const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(configValueSchema),
    z.record(configValueSchema),
  ])
)

export const pluginEntrySchema: z.ZodType<PluginEntry> = z.object({
  state: z.enum(['disabled', 'enabled', 'failed']),
  version: z.string().min(1),
  lastAppliedAt: z.string().nullable(),
})

export const configDocumentSchema: z.ZodType<ConfigDocument> = z.object({
  revision: z.number().int().min(0),
  values: z.record(configValueSchema),
  plugins: z.record(pluginEntrySchema),
})

export function serializeDocument(document: ConfigDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`
}

export function cloneDocument(document: ConfigDocument): ConfigDocument {
  return structuredClone(document)
}

export function cloneValue<T extends ConfigValue>(value: T): T {
  return structuredClone(value)
}

/** Structural equality on the serialized form; key order is significant. */
export function documentsEqual(a: ConfigDocument, b: ConfigDocument): boolean {
  return serializeDocument(a) === serializeDocument(b)
}

export function isSection(value: ConfigValue | undefined): value is ConfigSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class KeyPathError extends Error {
  readonly key: string

  constructor(key: string, message: string) {
    super(message)
    this.name = 'KeyPathError'
    this.key = key
  }
}

const RESERVED_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor'])

export function splitKey(key: string): string[] {
  const parts = key.split('.')
  for (const part of parts) {
    if (part.length === 0) {
      throw new KeyPathError(key, `Invalid configuration key "${key}": empty path segment`)
    }
    if (RESERVED_SEGMENTS.has(part)) {
      throw new KeyPathError(key, `Invalid configuration key "${key}": "${part}" is reserved`)
    }
  }
  return parts
}

export function getPath(section: ConfigSection, key: string): ConfigValue | undefined {
  let current: ConfigValue | undefined = section
  for (const part of splitKey(key)) {
    if (!isSection(current) || !Object.hasOwn(current, part)) return undefined
    current = current[part]
  }
  return current
}

/** Sets `key` in place, creating intermediate sections as needed. */
export function setPath(section: ConfigSection, key: string, value: ConfigValue): void {
  const parts = splitKey(key)
  const leaf = parts.pop()
  if (leaf === undefined) return
  let current = section
  const walked: string[] = []
  for (const part of parts) {
    walked.push(part)
    const next = Object.hasOwn(current, part) ? current[part] : undefined
    if (next === undefined) {
      const created: ConfigSection = {}
      current[part] = created
      current = created
      continue
    }
    if (!isSection(next)) {
      throw new KeyPathError(
        key,
        `Cannot set "${key}": "${walked.join('.')}" holds a value, not a section`
      )
    }
    current = next
  }
  current[leaf] = value
}

/**
 * Removes `key` in place and prunes sections left empty by the removal.
 * Returns false when the key was absent.
 */
export function unsetPath(section: ConfigSection, key: string): boolean {
  const parts = splitKey(key)
  const trail: Array<[ConfigSection, string]> = []
  let current = section
  for (const [index, part] of parts.entries()) {
    if (!Object.hasOwn(current, part)) return false
    if (index === parts.length - 1) {
      trail.push([current, part])
      break
    }
    const next = current[part]
    if (!isSection(next)) return false
    trail.push([current, part])
    current = next
  }

  const last = trail.pop()
  if (!last) return false
  delete last[0][last[1]]

  for (let i = trail.length - 1; i >= 0; i--) {
    const step = trail[i]
    if (!step) break
    const [parent, name] = step
    const child = parent[name]
    if (!isSection(child) || Object.keys(child).length > 0) break
    delete parent[name]
  }
  return true
}

/** Copies every leaf of `source` that is absent from `target`. */
export function mergeMissing(target: ConfigSection, source: ConfigSection): void {
  for (const [key, value] of Object.entries(source)) {
    if (!Object.hasOwn(target, key)) {
      target[key] = cloneValue(value)
      continue
    }
    const existing = target[key]
    if (isSection(existing) && isSection(value)) {
      mergeMissing(existing, value)
    }
  }
}
