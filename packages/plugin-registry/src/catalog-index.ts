import * as fs from 'node:fs/promises'
import { z } from 'zod'

import { isErrnoException } from '@scoreboard-hub/config-store'

import type { PluginRecord, PluginRecordState } from './types.js'

const indexSchema = z.object({
  plugins: z.array(
    z.object({
      name: z.string().min(1),
      url: z.string().optional(),
      description: z.string().optional(),
      version: z.string().optional(),
    })
  ),
})

/**
 * A plugin known to the published index (`plugins_index.json`), whether or
 * not it is installed.
 */
export interface CatalogIndexEntry {
  name: string
  url: string | null
  description: string | null
  version: string | null
}

export interface PluginListing {
  id: string
  status: PluginRecordState | 'available'
  installedVersion: string | null
  /** Latest version advertised by the index, when it lists one. */
  indexedVersion: string | null
  url: string | null
  description: string | null
  problem: string | null
}

/** Reads the plugin index. A missing file is an empty index. */
export async function readCatalogIndex(file: string): Promise<CatalogIndexEntry[]> {
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return []
    throw err
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new Error(
      `${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    )
  }
  const result = indexSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new Error(
      `${file} is not a plugin index${issue ? ` (${issue.path.join('.')}: ${issue.message})` : ''}`
    )
  }
  return result.data.plugins.map((plugin) => ({
    name: plugin.name,
    url: plugin.url ?? null,
    description: plugin.description ?? null,
    version: plugin.version ?? null,
  }))
}

/** Installed records merged with index entries; index-only plugins are `available`. */
export function mergeListings(
  records: readonly PluginRecord[],
  index: readonly CatalogIndexEntry[]
): PluginListing[] {
  const listings = new Map<string, PluginListing>()
  for (const entry of index) {
    listings.set(entry.name, {
      id: entry.name,
      status: 'available',
      installedVersion: null,
      indexedVersion: entry.version,
      url: entry.url,
      description: entry.description,
      problem: null,
    })
  }
  for (const record of records) {
    const indexed = listings.get(record.id)
    listings.set(record.id, {
      id: record.id,
      status: record.state,
      installedVersion: record.installedVersion,
      indexedVersion: indexed?.indexedVersion ?? null,
      url: indexed?.url ?? null,
      description: record.manifest?.description ?? indexed?.description ?? null,
      problem: record.problem,
    })
  }
  return [...listings.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
}
