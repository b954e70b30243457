import { existsSync, mkdirSync, writeFileSync } from 'node:fs'
import path from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'

import { resolveHubPaths, type HubPaths } from '@scoreboard-hub/config'
import { ConfigStore, type ConfigDocument, type PluginEntry } from '@scoreboard-hub/config-store'

import { PluginLayout } from '../src/layout.js'
import { boardLabel, PluginRegistry } from '../src/registry.js'
import { baseSchema, createTempDirs, pluginPackage, quietLogger } from './helpers.js'

const temp = createTempDirs()

afterEach(() => {
  temp.cleanup()
})

const INSTALLED_AT = '2026-10-19T12:00:00.000Z'

function createRegistry(): { registry: PluginRegistry; paths: HubPaths; store: ConfigStore } {
  const paths = resolveHubPaths(temp.make('hub-registry-'))
  const store = ConfigStore.fromPaths(paths, baseSchema, { logger: quietLogger })
  const registry = new PluginRegistry({
    store,
    layout: new PluginLayout(paths.pluginsDir, quietLogger),
    baseSchema,
    catalogIndexFile: paths.catalogIndexFile,
    logger: quietLogger,
  })
  return { registry, paths, store }
}

function documentWith(plugins: Record<string, PluginEntry>): ConfigDocument {
  return { revision: 0, values: {}, plugins }
}

const disabled = (version = '1.0.0'): PluginEntry => ({ state: 'disabled', version, lastAppliedAt: null })
const enabled = (version = '1.0.0'): PluginEntry => ({ state: 'enabled', version, lastAppliedAt: null })

describe('boardLabel', () => {
  it('title-cases board names', () => {
    expect(boardLabel('team_summary')).toBe('Team Summary')
    expect(boardLabel('clock')).toBe('Clock')
  })
})

describe('PluginRegistry.catalog', () => {
  it('loads manifests written at install time', async () => {
    const { registry } = createRegistry()
    await registry.stageFiles(pluginPackage('stats', { boards: ['stats_board'] }), INSTALLED_AT)

    const catalog = await registry.catalog(documentWith({ stats: enabled(), ghost: disabled() }))
    expect(catalog.record('stats')).toMatchObject({ state: 'installed-enabled', problem: null })
    expect(catalog.record('ghost')).toMatchObject({
      state: 'failed',
      problem: 'files for ghost@1.0.0 are missing',
    })
    expect(catalog.boards()).toEqual(['clock', 'scoreticker', 'stats_board'])
  })

  it('lists the canonical records', async () => {
    const { registry, store } = createRegistry()
    await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    await store.initialize(documentWith({ stats: disabled() }))
    expect((await registry.list()).map((record) => [record.id, record.state])).toEqual([
      ['stats', 'installed-disabled'],
    ])
  })
})

describe('PluginRegistry files', () => {
  it('writes files with install metadata and discards them again', async () => {
    const { registry, paths } = createRegistry()
    const dir = await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    expect(dir).toBe(path.join(paths.pluginsDir, 'stats', '1.0.0'))
    expect(existsSync(path.join(dir, 'board.js'))).toBe(true)

    const metadata = await registry.layout.readMetadata('stats', '1.0.0')
    expect(metadata).toMatchObject({ pluginId: 'stats', version: '1.0.0', installedAt: INSTALLED_AT })
    expect(metadata?.files.map((file) => file.path)).toEqual(['board.js'])

    await registry.discardStagedFiles([dir])
    expect(existsSync(path.join(paths.pluginsDir, 'stats'))).toBe(false)
  })

  it('removes a superseded version only', async () => {
    const { registry, paths } = createRegistry()
    await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    await registry.stageFiles(pluginPackage('stats', { version: '1.1.0' }), INSTALLED_AT)
    await registry.removePluginVersion('stats', '1.0.0')
    expect((await registry.layout.listOnDisk()).get('stats')).toEqual(['1.1.0'])

    await registry.removePluginFiles('stats')
    expect(existsSync(path.join(paths.pluginsDir, 'stats'))).toBe(false)
  })
})

describe('PluginRegistry.checkFileCollision', () => {
  it('reports a leftover directory nobody owns', async () => {
    const { registry } = createRegistry()
    const dir = await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    const catalog = await registry.catalog(documentWith({}))
    expect(await registry.checkFileCollision(pluginPackage('stats').manifest, catalog)).toEqual({
      code: 'FileCollision',
      path: dir,
      owner: null,
    })
  })

  it('reports a directory differing only by case', async () => {
    const { registry, paths } = createRegistry()
    await registry.stageFiles(pluginPackage('Stats'), INSTALLED_AT)
    const catalog = await registry.catalog(documentWith({}))
    expect(await registry.checkFileCollision(pluginPackage('stats').manifest, catalog)).toEqual({
      code: 'FileCollision',
      path: path.join(paths.pluginsDir, 'Stats'),
      owner: null,
    })
  })

  it('accepts a new version of an installed plugin', async () => {
    const { registry } = createRegistry()
    await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    const catalog = await registry.catalog(documentWith({ stats: disabled() }))
    const next = pluginPackage('stats', { version: '1.1.0' }).manifest
    expect(await registry.checkFileCollision(next, catalog)).toBeNull()
  })
})

describe('PluginRegistry.audit', () => {
  it('finds orphans, stray versions and modified files', async () => {
    const { registry, paths } = createRegistry()
    await registry.stageFiles(pluginPackage('stats', { version: '0.9.0' }), INSTALLED_AT)
    const current = await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    await registry.stageFiles(pluginPackage('old'), INSTALLED_AT)
    const document = documentWith({ stats: disabled() })

    expect(await registry.audit(document)).toEqual({
      orphanDirectories: [path.join(paths.pluginsDir, 'old')],
      strayVersions: [path.join(paths.pluginsDir, 'stats', '0.9.0')],
      damaged: [],
    })

    writeFileSync(path.join(current, 'board.js'), 'tampered')
    expect((await registry.audit(document)).damaged).toEqual([
      { id: 'stats', version: '1.0.0', problems: ['board.js: modified since install'] },
    ])
  })
})

describe('PluginRegistry.listings', () => {
  it('merges the plugin index with installed records', async () => {
    const { registry, paths } = createRegistry()
    await registry.stageFiles(pluginPackage('stats'), INSTALLED_AT)
    mkdirSync(path.dirname(paths.catalogIndexFile), { recursive: true })
    writeFileSync(
      paths.catalogIndexFile,
      JSON.stringify({
        plugins: [
          { name: 'weather', url: 'https://example.com/weather', description: 'Forecast' },
          { name: 'stats', url: 'https://example.com/stats', version: '1.2.0' },
        ],
      })
    )

    expect(await registry.listings(documentWith({ stats: disabled() }))).toEqual([
      {
        id: 'stats',
        status: 'installed-disabled',
        installedVersion: '1.0.0',
        indexedVersion: '1.2.0',
        url: 'https://example.com/stats',
        description: null,
        problem: null,
      },
      {
        id: 'weather',
        status: 'available',
        installedVersion: null,
        indexedVersion: null,
        url: 'https://example.com/weather',
        description: 'Forecast',
        problem: null,
      },
    ])
  })

  it('ignores an unreadable index', async () => {
    const { registry, paths } = createRegistry()
    mkdirSync(path.dirname(paths.catalogIndexFile), { recursive: true })
    writeFileSync(paths.catalogIndexFile, '{"plugins": [')
    expect(await registry.listings(documentWith({}))).toEqual([])
    await expect(registry.readCatalogIndex()).rejects.toThrow('is not valid JSON')
  })
})

describe('PluginRegistry.listBoards', () => {
  it('lists built-in boards and boards of enabled plugins', async () => {
    const { registry } = createRegistry()
    await registry.stageFiles(pluginPackage('stats', { boards: ['team_stats'] }), INSTALLED_AT)
    await registry.stageFiles(pluginPackage('weather', { boards: ['weather'] }), INSTALLED_AT)

    const boards = await registry.listBoards(documentWith({ stats: enabled(), weather: disabled() }))
    expect(boards).toEqual([
      { name: 'clock', label: 'Clock', source: 'built-in' },
      { name: 'scoreticker', label: 'Scoreticker', source: 'built-in' },
      { name: 'team_stats', label: 'Team Stats', source: 'stats' },
    ])
  })
})
