import { createLogger, type HealthPolicy, type Logger } from '@scoreboard-hub/config'

import { withTimeout } from './timeout.js'
import { ProcessState, type ProcessController } from './types.js'

export interface HealthCheck {
  healthy: boolean
  detail: string
}

export interface HealthProbe {
  readonly name: string
  /** Called once before the first check of a verification. */
  arm?(): Promise<void>
  check(): Promise<HealthCheck>
}

export interface HealthReport {
  healthy: boolean
  attempts: number
  elapsedMs: number
  /** Detail of the last unhealthy check, if any. */
  lastError: string | null
}

/** Any answer below 500 means the target is up and serving. */
export class HttpHealthProbe implements HealthProbe {
  readonly name: string
  private readonly url: string
  private readonly requestTimeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(url: string, requestTimeoutMs: number, fetchImpl: typeof fetch = fetch) {
    this.name = `http ${url}`
    this.url = url
    this.requestTimeoutMs = requestTimeoutMs
    this.fetchImpl = fetchImpl
  }

  async check(): Promise<HealthCheck> {
    const res = await this.fetchImpl(this.url, { signal: AbortSignal.timeout(this.requestTimeoutMs) })
    const healthy = res.status >= 200 && res.status < 500
    await res.body?.cancel()
    return { healthy, detail: `HTTP ${res.status}` }
  }
}

/**
 * Healthy while the process stays RUNNING as the incarnation seen when the
 * probe was armed. A crash loop shows up as a changed pid.
 */
export class SupervisorHealthProbe implements HealthProbe {
  readonly name: string
  private readonly controller: ProcessController
  private readonly processName: string
  private armed: { pid: number; startedAt: number } | null = null

  constructor(controller: ProcessController, processName: string) {
    this.name = `supervisor ${processName}`
    this.controller = controller
    this.processName = processName
  }

  async arm(): Promise<void> {
    const info = await this.controller.describe(this.processName)
    this.armed = { pid: info.pid, startedAt: info.startedAt }
  }

  async check(): Promise<HealthCheck> {
    const info = await this.controller.describe(this.processName)
    if (info.state !== ProcessState.RUNNING) {
      return { healthy: false, detail: `${this.processName} is ${info.stateName}` }
    }
    if (!this.armed) {
      this.armed = { pid: info.pid, startedAt: info.startedAt }
    }
    if (info.pid !== this.armed.pid || info.startedAt !== this.armed.startedAt) {
      return {
        healthy: false,
        detail: `${this.processName} restarted (pid ${this.armed.pid} -> ${info.pid})`,
      }
    }
    return { healthy: true, detail: `${this.processName} is RUNNING (pid ${info.pid})` }
  }
}

export interface VerifyHealthOptions {
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  logger?: Logger
}

/**
 * Polls `probe` until `policy.successThreshold` consecutive checks pass, or
 * the attempts or the overall timeout run out. Probe errors count as
 * unhealthy checks, and so does a check that does not answer within the
 * current interval cap or the time left.
 */
export async function verifyHealth(
  probe: HealthProbe,
  policy: HealthPolicy,
  options: VerifyHealthOptions = {}
): Promise<HealthReport> {
  const sleep =
    options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)))
  const now = options.now ?? Date.now
  const logger = options.logger ?? createLogger('HealthCheck')

  const startedAt = now()
  let interval = policy.intervalMs
  let consecutive = 0
  let attempts = 0
  let lastError: string | null = null

  const answerWithin = <T>(work: Promise<T>): Promise<T> => {
    const limit = Math.min(policy.maxIntervalMs, policy.timeoutMs - (now() - startedAt))
    return withTimeout(work, limit, `${probe.name} did not answer within ${Math.max(0, limit)}ms`)
  }

  try {
    if (probe.arm) await answerWithin(probe.arm())
  } catch (err) {
    lastError = err instanceof Error ? err.message : String(err)
    logger.warn(`Could not arm ${probe.name}: ${lastError}`)
  }

  while (attempts < policy.attempts) {
    attempts += 1
    try {
      const result = await answerWithin(probe.check())
      if (result.healthy) {
        consecutive += 1
        logger.debug(`${probe.name}: healthy (${consecutive}/${policy.successThreshold})`)
        if (consecutive >= policy.successThreshold) {
          return { healthy: true, attempts, elapsedMs: now() - startedAt, lastError }
        }
      } else {
        consecutive = 0
        lastError = result.detail
        logger.debug(`${probe.name}: unhealthy: ${result.detail}`)
      }
    } catch (err) {
      consecutive = 0
      lastError = err instanceof Error ? err.message : String(err)
      logger.debug(`${probe.name}: check failed: ${lastError}`)
    }

    if (attempts >= policy.attempts) break
    const remaining = policy.timeoutMs - (now() - startedAt)
    if (remaining <= 0) break
    await sleep(Math.min(interval, remaining))
    interval = Math.min(interval * policy.backoffFactor, policy.maxIntervalMs)
  }

  const elapsedMs = now() - startedAt
  logger.warn(`${probe.name} did not become healthy`, { attempts, elapsedMs, lastError })
  return { healthy: false, attempts, elapsedMs, lastError }
}
