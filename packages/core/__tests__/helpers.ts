import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import type { HubConfig, Logger } from '@scoreboard-hub/config'
import type { ConfigSchema } from '@scoreboard-hub/config-store'
import type { PluginManifest, PluginPackage } from '@scoreboard-hub/plugin-registry'
import type {
  HealthCheck,
  HealthProbe,
  ProcessController,
  ProcessInfo,
  ProcessStatus,
  RestartResult,
} from '@scoreboard-hub/process-control'

import { createHubContext, initializeHub, type HubContext } from '../src/context.js'

export const quietLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z')

export const testSchema: ConfigSchema = {
  boards: ['clock', 'scoreticker'],
  fields: [
    { key: 'preferences.live_game_refresh_rate', type: 'integer', min: 10, max: 60, default: 15 },
    { key: 'states.off_day', type: 'board-list', default: ['clock'] },
  ],
}

export function testConfig(scoreboardDir: string): HubConfig {
  return {
    scoreboardDir,
    processName: 'scoreboard',
    supervisor: { host: '127.0.0.1', port: 9001, username: null, password: null },
    restartTimeoutMs: 60_000,
    healthUrl: null,
    health: {
      attempts: 3,
      intervalMs: 100,
      backoffFactor: 1,
      maxIntervalMs: 100,
      timeoutMs: 10_000,
      successThreshold: 1,
    },
    backupRetention: 5,
    logLevel: 'error',
  }
}

function runningInfo(name: string, pid: number): ProcessInfo {
  return {
    name,
    group: name,
    state: 20,
    stateName: 'RUNNING',
    pid,
    startedAt: 1000 + pid,
    stoppedAt: 0,
    exitStatus: 0,
    description: `pid ${pid}`,
  }
}

/**
 * Records restarts. Scripted results are used in order, `null` standing for
 * a normal restart; once they run out every restart succeeds.
 */
export class FakeProcessController implements ProcessController {
  readonly restarts: string[] = []
  /** `start <name>` and `stop <name>`, in call order. */
  readonly actions: string[] = []
  /** Thrown by the next start or stop. */
  actionError: Error | null = null
  readonly results: Array<RestartResult | null> = []
  statusValue: ProcessStatus = 'running'
  /** When set, `restart` waits for it before answering. */
  gate: Promise<void> | null = null
  onRestart: (() => void) | null = null
  private pid = 100

  async status(): Promise<ProcessStatus> {
    return this.statusValue
  }

  async describe(name: string): Promise<ProcessInfo> {
    return runningInfo(name, this.pid)
  }

  async restart(name: string): Promise<RestartResult> {
    this.restarts.push(name)
    this.onRestart?.()
    if (this.gate) await this.gate
    const scripted = this.results.shift()
    if (scripted) return scripted
    this.pid += 1
    return { success: true, info: runningInfo(name, this.pid) }
  }

  /** supervisord respawned the process on its own. */
  reincarnate(): void {
    this.pid += 1
  }

  async start(name: string): Promise<void> {
    this.act(`start ${name}`)
    this.statusValue = 'running'
  }

  async stop(name: string): Promise<void> {
    this.act(`stop ${name}`)
    this.statusValue = 'stopped'
  }

  private act(action: string): void {
    this.actions.push(action)
    const error = this.actionError
    this.actionError = null
    if (error) throw error
  }

  async listProcesses(): Promise<ProcessInfo[]> {
    return [runningInfo('scoreboard', this.pid)]
  }

  async tailStderr(): Promise<string> {
    return ''
  }
}

/** Answers from `script` in order, repeating the last answer. */
export class ScriptedProbe implements HealthProbe {
  readonly name = 'scripted'
  checks = 0
  private readonly script: HealthCheck[]

  constructor(...script: HealthCheck[]) {
    this.script = script.length > 0 ? script : [{ healthy: true, detail: 'ok' }]
  }

  async check(): Promise<HealthCheck> {
    const answer = this.script[Math.min(this.checks, this.script.length - 1)]
    this.checks += 1
    if (!answer) throw new Error('empty script')
    return answer
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

export interface Harness {
  context: HubContext
  controller: FakeProcessController
  probe: ScriptedProbe
  sleeps: number[]
}

export interface HarnessOptions {
  probe?: ScriptedProbe
  isAlive?: (pid: number) => boolean
  initialize?: boolean
}

export async function createHarness(dir: string, options: HarnessOptions = {}): Promise<Harness> {
  const controller = new FakeProcessController()
  const probe = options.probe ?? new ScriptedProbe()
  const sleeps: number[] = []
  const context = createHubContext(testConfig(dir), {
    schema: testSchema,
    controller,
    probe,
    isAlive: options.isAlive ?? (() => false),
    sleep: async (ms) => {
      sleeps.push(ms)
    },
    now: () => FIXED_NOW,
    clock: () => 0,
    logger: () => quietLogger,
  })
  if (options.initialize ?? true) await initializeHub(context)
  return { context, controller, probe, sleeps }
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
    files: [{ path: built.entry, contents: Buffer.from(`// ${id} ${built.version}\n`) }],
    source: `/packages/${id}`,
  }
}
