import { z } from 'zod'

import { createLogger, type Logger } from '@scoreboard-hub/config'

import {
  isFault,
  SupervisorFault,
  SupervisorFaultError,
  SupervisorUnreachableError,
} from './errors.js'
import { DeadlineError, withTimeout } from './timeout.js'
import type { XmlRpcTransport } from './transport.js'
import {
  ProcessState,
  toProcessStatus,
  type ProcessController,
  type ProcessInfo,
  type ProcessStatus,
  type RestartError,
  type RestartResult,
} from './types.js'

const processInfoSchema = z.object({
  name: z.string(),
  group: z.string(),
  state: z.number().int(),
  statename: z.string(),
  start: z.number(),
  stop: z.number(),
  pid: z.number().int(),
  exitstatus: z.number().int(),
  description: z.string(),
})

const tailSchema = z.tuple([z.string(), z.number(), z.boolean()])

function toProcessInfo(raw: unknown, method: string): ProcessInfo {
  const parsed = processInfoSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Unexpected answer to ${method}: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  }
  const info = parsed.data
  return {
    name: info.name,
    group: info.group,
    state: info.state,
    stateName: info.statename,
    pid: info.pid,
    startedAt: info.start,
    stoppedAt: info.stop,
    exitStatus: info.exitstatus,
    description: info.description,
  }
}

export interface SupervisorControllerOptions {
  transport: XmlRpcTransport
  pollIntervalMs?: number
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  logger?: Logger
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Process control through supervisord's XML-RPC interface. */
export class SupervisorController implements ProcessController {
  private readonly transport: XmlRpcTransport
  private readonly pollIntervalMs: number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly logger: Logger

  constructor(options: SupervisorControllerOptions) {
    this.transport = options.transport
    this.pollIntervalMs = options.pollIntervalMs ?? 500
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
    this.logger = options.logger ?? createLogger('SupervisorController')
  }

  async describe(name: string): Promise<ProcessInfo> {
    return toProcessInfo(
      await this.transport.call('supervisor.getProcessInfo', [name]),
      'supervisor.getProcessInfo'
    )
  }

  async status(name: string): Promise<ProcessStatus> {
    try {
      return toProcessStatus((await this.describe(name)).state)
    } catch (err) {
      if (err instanceof SupervisorUnreachableError || err instanceof SupervisorFaultError) {
        this.logger.warn(`Status of ${name} is unknown: ${err.message}`)
        return 'unknown'
      }
      throw err
    }
  }

  async listProcesses(): Promise<ProcessInfo[]> {
    const raw = await this.transport.call('supervisor.getAllProcessInfo', [])
    if (!Array.isArray(raw)) {
      throw new Error('Unexpected answer to supervisor.getAllProcessInfo: expected a list')
    }
    return raw.map((entry: unknown) => toProcessInfo(entry, 'supervisor.getAllProcessInfo'))
  }

  async start(name: string): Promise<void> {
    try {
      await this.transport.call('supervisor.startProcess', [name, true])
    } catch (err) {
      if (!isFault(err, SupervisorFault.ALREADY_STARTED)) throw err
      this.logger.debug(`${name} was already running`)
    }
  }

  async stop(name: string): Promise<void> {
    try {
      await this.transport.call('supervisor.stopProcess', [name, true])
    } catch (err) {
      if (!isFault(err, SupervisorFault.NOT_RUNNING)) throw err
      this.logger.debug(`${name} was not running`)
    }
  }

  async tailStderr(name: string, bytes: number): Promise<string> {
    const raw = await this.transport.call('supervisor.tailProcessStderrLog', [name, 0, bytes])
    const parsed = tailSchema.safeParse(raw)
    if (!parsed.success) {
      throw new Error('Unexpected answer to supervisor.tailProcessStderrLog')
    }
    return parsed.data[0]
  }

  async restart(name: string, timeoutMs: number): Promise<RestartResult> {
    const deadline = this.now() + timeoutMs
    this.logger.info(`Restarting ${name}`, { timeoutMs })
    try {
      const info = await withTimeout(
        this.restartAndWait(name, deadline),
        deadline - this.now(),
        `${name} restart deadline passed`
      )
      this.logger.info(`${name} is running again`, { pid: info.pid })
      return { success: true, info }
    } catch (err) {
      const error = this.toRestartError(err, name, timeoutMs)
      this.logger.warn(`Restart of ${name} failed: ${error.message}`)
      return { success: false, error }
    }
  }

  private async restartAndWait(name: string, deadline: number): Promise<ProcessInfo> {
    const before = await this.describe(name)
    await this.stop(name)
    await this.start(name)

    for (;;) {
      const info = await this.describe(name)
      const reincarnated = info.pid !== before.pid || info.startedAt !== before.startedAt
      if (info.state === ProcessState.RUNNING && reincarnated) return info
      if (info.state === ProcessState.FATAL) {
        throw new SupervisorFaultError(
          SupervisorFault.SPAWN_ERROR,
          `${name} entered FATAL: ${info.description}`
        )
      }
      const remaining = deadline - this.now()
      if (remaining <= 0) throw new DeadlineError(`${name} restart deadline passed`)
      await this.sleep(Math.min(this.pollIntervalMs, remaining))
    }
  }

  private toRestartError(err: unknown, name: string, timeoutMs: number): RestartError {
    if (err instanceof DeadlineError) {
      return {
        code: 'Timeout',
        message: `${name} did not return to RUNNING within ${timeoutMs}ms`,
      }
    }
    if (err instanceof SupervisorUnreachableError) {
      return { code: 'SupervisorUnreachable', message: err.message }
    }
    return { code: 'Fault', message: err instanceof Error ? err.message : String(err) }
  }
}
