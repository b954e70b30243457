import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import type { Logger } from '@scoreboard-hub/config'

import type { ConfigDocument, ConfigSchema } from '../src/types.js'

export const quietLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

export const testSchema: ConfigSchema = {
  boards: ['clock', 'scoreticker'],
  fields: [
    {
      key: 'preferences.live_game_refresh_rate',
      type: 'integer',
      required: true,
      min: 10,
      max: 60,
      default: 15,
    },
    { key: 'preferences.time_format', type: 'string', enum: ['12h', '24h'], default: '12h' },
    { key: 'preferences.end_of_day', type: 'string', pattern: '^\\d{1,2}:\\d{2}$' },
    { key: 'preferences.teams', type: 'string-list', default: [] },
    { key: 'states.off_day', type: 'board-list', default: ['clock'] },
    { key: 'debug', type: 'boolean', default: false },
  ],
}

export function testDocument(): ConfigDocument {
  return {
    revision: 0,
    values: {
      debug: false,
      preferences: { live_game_refresh_rate: 15, time_format: '12h', teams: [] },
      states: { off_day: ['clock'] },
    },
    plugins: {},
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
