import { existsSync } from 'node:fs'

import {
  loadHubConfig,
  resolveHubPaths,
  setLogLevel,
  type HubConfig,
} from '@scoreboard-hub/config'
import {
  createHubContext,
  initializeHub,
  type HubContext,
  type HubContextOverrides,
} from '@scoreboard-hub/core'

/** Flags accepted before any command. */
export interface GlobalOptions {
  dir?: string
  envFile?: string
  supervisorUrl?: string
  supervisorPort?: string
  process?: string
  json?: boolean
}

/**
 * Hub settings for a CLI run. Without `--env-file`, `<dir>/.hub/hub.env` is
 * read when it exists.
 */
export function resolveHubConfig(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): HubConfig {
  const dir = options.dir ?? env.SCOREBOARD_DIR ?? '.'
  let envFile = options.envFile
  if (!envFile) {
    const candidate = resolveHubPaths(dir).envFile
    if (existsSync(candidate)) envFile = candidate
  }
  return loadHubConfig({
    env,
    envFile,
    overrides: {
      SCOREBOARD_DIR: options.dir,
      SUPERVISOR_URL: options.supervisorUrl,
      SUPERVISOR_PORT: options.supervisorPort,
      SCOREBOARD_PROCESS: options.process,
    },
  })
}

/**
 * Builds the hub for one command. Unless `initialize` is false the canonical
 * document is seeded on first use.
 */
export async function openHub(
  options: GlobalOptions,
  overrides: HubContextOverrides = {},
  initialize = true
): Promise<HubContext> {
  const config = resolveHubConfig(options)
  setLogLevel(config.logLevel)
  const context = createHubContext(config, overrides)
  if (initialize) await initializeHub(context)
  return context
}
