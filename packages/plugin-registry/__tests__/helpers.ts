import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import type { Logger } from '@scoreboard-hub/config'
import type { ConfigSchema } from '@scoreboard-hub/config-store'

import type { PluginManifest } from '../src/manifest.js'
import type { PluginPackage } from '../src/package-source.js'

export const quietLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

export const baseSchema: ConfigSchema = {
  boards: ['clock', 'scoreticker'],
  fields: [
    { key: 'preferences.live_game_refresh_rate', type: 'integer', min: 10, max: 60, default: 15 },
    { key: 'states.off_day', type: 'board-list', default: ['clock'] },
  ],
}

export function manifest(
  id: string,
  overrides: Partial<Omit<PluginManifest, 'id'>> = {}
): PluginManifest {
  return {
    id,
    version: '1.0.0',
    name: null,
    description: null,
    entry: 'board.js',
    dependencies: [],
    config: [],
    boards: [],
    ...overrides,
  }
}

export function pluginPackage(
  id: string,
  overrides: Partial<Omit<PluginManifest, 'id'>> = {}
): PluginPackage {
  const built = manifest(id, overrides)
  return {
    manifest: built,
    files: [{ path: built.entry, contents: Buffer.from(`# ${id} ${built.version}\n`) }],
    source: `/packages/${id}`,
  }
}

export function createTempDirs() {
  const tempDirs: string[] = []
  return {
    make(prefix: string): string {
      const dir = mkdtempSync(path.join(tmpdir(), prefix))
      tempDirs.push(dir)
      return dir
    },
    cleanup(): void {
      for (const dir of tempDirs.splice(0)) {
        rmSync(dir, { recursive: true, force: true })
      }
    },
  }
}

/** Writes `files` (relative path to contents) under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = path.join(root, relativePath)
    mkdirSync(path.dirname(target), { recursive: true })
    writeFileSync(target, contents)
  }
}
