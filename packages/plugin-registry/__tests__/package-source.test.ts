import { mkdirSync, writeFileSync } from 'node:fs'
import path from 'node:path'
import { create } from 'tar'
import { afterEach, describe, expect, it } from 'vitest'

import { loadPluginPackage, readPackageDir } from '../src/package-source.js'
import { createTempDirs, writeTree } from './helpers.js'

const temp = createTempDirs()

afterEach(() => {
  temp.cleanup()
})

const statsManifest = JSON.stringify({ id: 'stats', version: '1.0.0', entry: 'board.js' })

describe('readPackageDir', () => {
  it('collects package files and skips installed artifacts', async () => {
    const dir = temp.make('package-')
    writeTree(dir, {
      'plugin.json': statsManifest,
      'board.js': 'export default {}\n',
      'assets/logo.txt': 'logo',
      'node_modules/dep/index.js': '',
      '.metadata.json': '{}',
    })

    const result = await readPackageDir(dir)
    if (!result.success) throw new Error(result.issues.join('; '))
    expect(result.package.manifest.id).toBe('stats')
    expect(result.package.source).toBe(path.resolve(dir))
    expect(result.package.files.map((file) => file.path)).toEqual([
      'assets/logo.txt',
      'board.js',
      'plugin.json',
    ])
    expect(result.package.files[0]?.contents.toString()).toBe('logo')
  })

  it('prefixes manifest issues with the manifest source', async () => {
    const dir = temp.make('package-')
    writeTree(dir, {
      'plugin.json': JSON.stringify({ id: 'Stats', version: '1.0.0', entry: 'board.js' }),
      'board.js': '',
    })
    expect(await readPackageDir(dir)).toEqual({
      success: false,
      issues: ['plugin.json id: must start with a lowercase letter and use only a-z, 0-9, _ or -'],
    })
  })

  it('reports a missing entry file', async () => {
    const dir = temp.make('package-')
    writeTree(dir, { 'plugin.json': statsManifest })
    expect(await readPackageDir(dir)).toEqual({
      success: false,
      issues: ['entry: board.js is not part of the package'],
    })
  })

  it('reports a directory without a manifest', async () => {
    const dir = temp.make('package-')
    expect(await readPackageDir(dir)).toEqual({
      success: false,
      issues: [`manifest: no plugin.json or "scoreboard" key in package.json in ${path.resolve(dir)}`],
    })
  })
})

describe('loadPluginPackage', () => {
  it('reads a gzipped tarball with a package/ prefix', async () => {
    const dir = temp.make('archive-')
    writeTree(path.join(dir, 'package'), { 'plugin.json': statsManifest, 'board.js': '' })
    const archive = path.join(dir, 'stats-1.0.0.tgz')
    await create({ gzip: true, file: archive, cwd: dir }, ['package'])

    const result = await loadPluginPackage(archive)
    if (!result.success) throw new Error(result.issues.join('; '))
    expect(result.package.source).toBe(archive)
    expect(result.package.files.map((file) => file.path)).toEqual(['board.js', 'plugin.json'])
  })

  it('rejects a missing source', async () => {
    const missing = path.join(temp.make('source-'), 'nowhere')
    expect(await loadPluginPackage(missing)).toEqual({
      success: false,
      issues: [`source: ${missing} does not exist`],
    })
  })

  it('rejects a file that is not an archive', async () => {
    const dir = temp.make('source-')
    mkdirSync(dir, { recursive: true })
    const notes = path.join(dir, 'notes.txt')
    writeFileSync(notes, 'hello')
    expect(await loadPluginPackage(notes)).toEqual({
      success: false,
      issues: [`source: ${notes} is neither a directory nor a .tgz archive`],
    })
  })
})
