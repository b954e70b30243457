import { existsSync, readdirSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs'
import path from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'

import { resolveHubPaths, type HubPaths } from '@scoreboard-hub/config'

import { cloneDocument, serializeDocument, setPath } from '../src/document.js'
import { CommitError, StaleStageError, StoreUnavailableError } from '../src/errors.js'
import { ConfigStore } from '../src/store.js'
import { createTempDirs, quietLogger, testDocument, testSchema } from './helpers.js'

const temp = createTempDirs()

afterEach(() => {
  temp.cleanup()
})

const FIXED_NOW = new Date('2026-10-19T12:00:00.000Z')

function createStore(backupRetention = 5): { store: ConfigStore; paths: HubPaths } {
  const paths = resolveHubPaths(temp.make('hub-store-'))
  const store = ConfigStore.fromPaths(paths, testSchema, {
    backupRetention,
    now: () => FIXED_NOW,
    logger: quietLogger,
  })
  return { store, paths }
}

async function createInitializedStore(backupRetention = 5) {
  const created = createStore(backupRetention)
  await created.store.initialize(testDocument())
  return created
}

async function withDebug(store: ConfigStore, debug: boolean) {
  const candidate = cloneDocument(await store.read())
  setPath(candidate.values, 'debug', debug)
  return candidate
}

describe('ConfigStore.read', () => {
  it('fails with StoreUnavailableError before initialization', async () => {
    const { store } = createStore()
    const error = await store.read().catch((err: unknown) => err)
    expect(error).toBeInstanceOf(StoreUnavailableError)
    expect(error).toMatchObject({ code: 'STORE_UNAVAILABLE' })
  })

  it('fails with StoreUnavailableError on corrupt JSON', async () => {
    const { store, paths } = createStore()
    mkdirSync(paths.hubDir, { recursive: true })
    writeFileSync(paths.statePath, '{ "revision": ', 'utf8')
    await expect(store.read()).rejects.toThrow(/is not valid JSON/)
  })

  it('fails with StoreUnavailableError on a wrong shape', async () => {
    const { store, paths } = createStore()
    mkdirSync(paths.hubDir, { recursive: true })
    writeFileSync(paths.statePath, JSON.stringify({ revision: 'one', values: {}, plugins: {} }))
    await expect(store.read()).rejects.toBeInstanceOf(StoreUnavailableError)
  })
})

describe('ConfigStore.initialize', () => {
  it('seeds the canonical document once', async () => {
    const { store, paths } = createStore()
    expect(await store.initialize(testDocument())).toBe(true)
    expect(readFileSync(paths.statePath, 'utf8')).toBe(serializeDocument(testDocument()))

    const other = testDocument()
    setPath(other.values, 'debug', true)
    expect(await store.initialize(other)).toBe(false)
    expect(await store.read()).toEqual(testDocument())
  })

  it('refuses invalid defaults', async () => {
    const { store, paths } = createStore()
    const defaults = testDocument()
    setPath(defaults.values, 'preferences.live_game_refresh_rate', 5)
    await expect(store.initialize(defaults)).rejects.toThrow(
      'Initial configuration is invalid: preferences.live_game_refresh_rate: must be >= 10'
    )
    expect(existsSync(paths.statePath)).toBe(false)
  })

  it('readOrInitialize returns the existing document', async () => {
    const { store } = await createInitializedStore()
    const other = testDocument()
    setPath(other.values, 'debug', true)
    expect(await store.readOrInitialize(other)).toEqual(testDocument())
  })
})

describe('ConfigStore.stage and discard', () => {
  it('never changes the canonical document', async () => {
    const { store, paths } = await createInitializedStore()
    const before = readFileSync(paths.statePath)

    const handle = await store.stage(await withDebug(store, true))
    expect(handle.document.revision).toBe(1)
    expect(handle.baseRevision).toBe(0)
    expect(existsSync(handle.path)).toBe(true)
    expect(await store.read()).toEqual(testDocument())

    await store.discard(handle)
    expect(existsSync(handle.path)).toBe(false)
    expect(readFileSync(paths.statePath).equals(before)).toBe(true)
    expect(readdirSync(paths.stagingDir)).toEqual([])
  })

  it('tolerates discarding twice', async () => {
    const { store } = await createInitializedStore()
    const handle = await store.stage(await withDebug(store, true))
    await store.discard(handle)
    await expect(store.discard(handle)).resolves.toBeUndefined()
  })
})

describe('ConfigStore.commit', () => {
  it('replaces the canonical document with the next revision', async () => {
    const { store, paths } = await createInitializedStore()
    const handle = await store.stage(await withDebug(store, true))
    const committed = await store.commit(handle)

    expect(committed.revision).toBe(1)
    const canonical = await store.read()
    expect(canonical.revision).toBe(1)
    expect(canonical.values.debug).toBe(true)
    expect(existsSync(handle.path)).toBe(false)
    expect(readdirSync(paths.backupsDir)).toEqual(['state.20261019120000.0.json'])
    expect(readFileSync(path.join(paths.backupsDir, 'state.20261019120000.0.json'), 'utf8')).toBe(
      serializeDocument(testDocument())
    )
  })

  it('lets only one of two concurrent stages commit', async () => {
    const { store } = await createInitializedStore()
    const first = await store.stage(await withDebug(store, true))
    const second = await store.stage(await withDebug(store, false))
    expect(first.id).not.toBe(second.id)

    await store.commit(first)
    const afterFirst = await store.readSnapshot()

    const error = await store.commit(second).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(StaleStageError)
    expect(error).toMatchObject({ code: 'STALE_STAGE' })
    expect((await store.readSnapshot()).checksum).toBe(afterFirst.checksum)
  })

  it('fails with CommitError when the staged file was tampered with', async () => {
    const { store, paths } = await createInitializedStore()
    const before = readFileSync(paths.statePath)
    const handle = await store.stage(await withDebug(store, true))
    writeFileSync(handle.path, '{}', 'utf8')

    await expect(store.commit(handle)).rejects.toBeInstanceOf(CommitError)
    expect(readFileSync(paths.statePath).equals(before)).toBe(true)
  })

  it('keeps only the newest backups', async () => {
    const { store } = await createInitializedStore(2)
    for (let i = 0; i < 4; i++) {
      await store.commit(await store.stage(await withDebug(store, i % 2 === 0)))
    }
    const backups = await store.listBackups()
    expect(backups.map((entry) => entry.revision)).toEqual([3, 2])
    expect(backups[0]).toMatchObject({
      file: 'state.20261019120000.3.json',
      createdAt: '2026-10-19T12:00:00Z',
    })
  })

  it('writes no backups when retention is zero', async () => {
    const { store } = await createInitializedStore(0)
    await store.commit(await store.stage(await withDebug(store, true)))
    expect(await store.listBackups()).toEqual([])
  })
})

describe('ConfigStore.restore', () => {
  it('brings back the exact snapshot bytes', async () => {
    const { store, paths } = await createInitializedStore()
    const snapshot = await store.readSnapshot()
    await store.commit(await store.stage(await withDebug(store, true)))

    expect(await store.restore(snapshot)).toBe(true)
    expect(readFileSync(paths.statePath).equals(snapshot.bytes)).toBe(true)
    expect(await store.restore(snapshot)).toBe(false)
  })
})

describe('ConfigStore.sweepStaging', () => {
  it('removes leftover staged files', async () => {
    const { store, paths } = await createInitializedStore()
    const handle = await store.stage(await withDebug(store, true))
    expect(await store.sweepStaging()).toEqual([handle.path])
    expect(readdirSync(paths.stagingDir)).toEqual([])
  })
})
