import { existsSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'

import { LOG_LEVELS, type LogLevel } from './logger.js'

const positiveInt = z.coerce.number().int().positive()

export const hubEnvSchema = z
  .object({
    SCOREBOARD_DIR: z.string().min(1).default('.'),
    SCOREBOARD_PROCESS: z.string().min(1).default('scoreboard'),
    // Supervisor XML-RPC endpoint
    SUPERVISOR_URL: z.string().min(1).default('127.0.0.1'),
    SUPERVISOR_PORT: z.coerce.number().int().min(1).max(65_535).default(9001),
    SUPERVISOR_USERNAME: z.string().optional(),
    SUPERVISOR_PASSWORD: z.string().optional(),
    RESTART_TIMEOUT_MS: positiveInt.default(60_000),
    // Health verification after a restart
    HEALTH_URL: z.string().url().optional(),
    HEALTH_ATTEMPTS: positiveInt.default(10),
    HEALTH_INTERVAL_MS: positiveInt.default(1000),
    HEALTH_BACKOFF_FACTOR: z.coerce.number().min(1).default(1.5),
    HEALTH_MAX_INTERVAL_MS: positiveInt.default(5000),
    HEALTH_TIMEOUT_MS: positiveInt.default(30_000),
    HEALTH_SUCCESS_THRESHOLD: positiveInt.default(2),
    BACKUP_RETENTION: z.coerce.number().int().min(0).default(5),
    HUB_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.HEALTH_SUCCESS_THRESHOLD > env.HEALTH_ATTEMPTS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HEALTH_SUCCESS_THRESHOLD'],
        message: `must not exceed HEALTH_ATTEMPTS (${env.HEALTH_ATTEMPTS})`,
      })
    }
    if (env.HEALTH_MAX_INTERVAL_MS < env.HEALTH_INTERVAL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HEALTH_MAX_INTERVAL_MS'],
        message: `must be at least HEALTH_INTERVAL_MS (${env.HEALTH_INTERVAL_MS})`,
      })
    }
  })

export type HubEnv = z.infer<typeof hubEnvSchema>

export type HubEnvKey = keyof HubEnv

export const HUB_ENV_KEYS: readonly HubEnvKey[] = [
  'SCOREBOARD_DIR',
  'SCOREBOARD_PROCESS',
  'SUPERVISOR_URL',
  'SUPERVISOR_PORT',
  'SUPERVISOR_USERNAME',
  'SUPERVISOR_PASSWORD',
  'RESTART_TIMEOUT_MS',
  'HEALTH_URL',
  'HEALTH_ATTEMPTS',
  'HEALTH_INTERVAL_MS',
  'HEALTH_BACKOFF_FACTOR',
  'HEALTH_MAX_INTERVAL_MS',
  'HEALTH_TIMEOUT_MS',
  'HEALTH_SUCCESS_THRESHOLD',
  'BACKUP_RETENTION',
  'HUB_LOG_LEVEL',
]

export interface HealthPolicy {
  attempts: number
  intervalMs: number
  backoffFactor: number
  maxIntervalMs: number
  timeoutMs: number
  successThreshold: number
}

export interface SupervisorSettings {
  host: string
  port: number
  username: string | null
  password: string | null
}

export interface HubConfig {
  scoreboardDir: string
  processName: string
  supervisor: SupervisorSettings
  restartTimeoutMs: number
  healthUrl: string | null
  health: HealthPolicy
  backupRetention: number
  logLevel: LogLevel
}

export function parseEnvFile(content: string): Record<string, string> {
  const values: Record<string, string> = {}
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()
    if (!line || line.startsWith('#')) continue
    const idx = line.indexOf('=')
    if (idx <= 0) continue
    const key = line.slice(0, idx).trim()
    const value = line.slice(idx + 1).trim()
    values[key] = value
  }
  return values
}

export interface LoadHubConfigOptions {
  env?: NodeJS.ProcessEnv
  /** Optional KEY=VALUE file; it is an error for an explicitly named file to be missing. */
  envFile?: string
  /** Highest-precedence values, typically from CLI flags. */
  overrides?: Partial<Record<HubEnvKey, string | number | undefined>>
}

function pickKnown(
  source: Record<string, string | number | undefined>
): Partial<Record<HubEnvKey, string>> {
  const picked: Partial<Record<HubEnvKey, string>> = {}
  for (const key of HUB_ENV_KEYS) {
    const value = source[key]
    if (value === undefined) continue
    const text = String(value).trim()
    if (text === '') continue
    picked[key] = text
  }
  return picked
}

/**
 * Resolves hub settings. Precedence, lowest first: schema defaults, env file,
 * process env, overrides.
 */
export function loadHubConfig(options: LoadHubConfigOptions = {}): HubConfig {
  let fileValues: Record<string, string> = {}
  if (options.envFile) {
    if (!existsSync(options.envFile)) {
      throw new Error(`Hub env file not found: ${options.envFile}`)
    }
    fileValues = parseEnvFile(readFileSync(options.envFile, 'utf8'))
  }

  const merged = {
    ...pickKnown(fileValues),
    ...pickKnown(options.env ?? process.env),
    ...pickKnown(options.overrides ?? {}),
  }

  const result = hubEnvSchema.safeParse(merged)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid hub configuration: ${details}`)
  }

  return toHubConfig(result.data)
}

export function toHubConfig(env: HubEnv): HubConfig {
  return {
    scoreboardDir: path.resolve(env.SCOREBOARD_DIR),
    processName: env.SCOREBOARD_PROCESS,
    supervisor: {
      host: env.SUPERVISOR_URL,
      port: env.SUPERVISOR_PORT,
      username: env.SUPERVISOR_USERNAME ?? null,
      password: env.SUPERVISOR_PASSWORD ?? null,
    },
    restartTimeoutMs: env.RESTART_TIMEOUT_MS,
    healthUrl: env.HEALTH_URL ?? null,
    health: {
      attempts: env.HEALTH_ATTEMPTS,
      intervalMs: env.HEALTH_INTERVAL_MS,
      backoffFactor: env.HEALTH_BACKOFF_FACTOR,
      maxIntervalMs: env.HEALTH_MAX_INTERVAL_MS,
      timeoutMs: env.HEALTH_TIMEOUT_MS,
      successThreshold: env.HEALTH_SUCCESS_THRESHOLD,
    },
    backupRetention: env.BACKUP_RETENTION,
    logLevel: env.HUB_LOG_LEVEL,
  }
}
