import * as fs from 'node:fs/promises'

import {
  createLogger,
  ensureHubDirs,
  resolveHubPaths,
  type HubConfig,
  type HubPaths,
  type Logger,
} from '@scoreboard-hub/config'
import {
  ConfigStore,
  configValueSchema,
  defaultDocument,
  isErrnoException,
  isSection,
  loadBaseSchema,
  mergeMissing,
  type ConfigDocument,
  type ConfigSchema,
} from '@scoreboard-hub/config-store'
import { PluginLayout, PluginRegistry } from '@scoreboard-hub/plugin-registry'
import {
  createXmlRpcTransport,
  HttpHealthProbe,
  SupervisorController,
  SupervisorHealthProbe,
  type HealthProbe,
  type ProcessController,
  type XmlRpcTransport,
} from '@scoreboard-hub/process-control'

import { TransactionJournal } from './journal.js'
import { TransactionLock } from './lock.js'
import { Orchestrator } from './orchestrator.js'
import { RuntimeViewPublisher } from './runtime-view.js'

export interface HubContext {
  config: HubConfig
  paths: HubPaths
  schema: ConfigSchema
  store: ConfigStore
  layout: PluginLayout
  registry: PluginRegistry
  controller: ProcessController
  probe: HealthProbe
  lock: TransactionLock
  journal: TransactionJournal
  runtimeView: RuntimeViewPublisher
  orchestrator: Orchestrator
  logger: Logger
}

/** Seams for tests and embedding; anything left out is built from the config. */
export interface HubContextOverrides {
  schema?: ConfigSchema
  transport?: XmlRpcTransport
  controller?: ProcessController
  probe?: HealthProbe
  fetchImpl?: typeof fetch
  isAlive?: (pid: number) => boolean
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
  clock?: () => number
  logger?: (scope: string) => Logger
}

export function createHubContext(config: HubConfig, overrides: HubContextOverrides = {}): HubContext {
  const logger = overrides.logger ?? createLogger
  const paths = resolveHubPaths(config.scoreboardDir)
  const schema = overrides.schema ?? loadBaseSchema()
  const store = ConfigStore.fromPaths(paths, schema, {
    backupRetention: config.backupRetention,
    now: overrides.now,
    logger: logger('ConfigStore'),
  })
  const layout = new PluginLayout(paths.pluginsDir, logger('PluginLayout'))
  const registry = new PluginRegistry({
    store,
    layout,
    baseSchema: schema,
    catalogIndexFile: paths.catalogIndexFile,
    logger: logger('PluginRegistry'),
  })

  const controller =
    overrides.controller ??
    new SupervisorController({
      transport: overrides.transport ?? createXmlRpcTransport(config.supervisor),
      sleep: overrides.sleep,
      now: overrides.clock,
      logger: logger('SupervisorController'),
    })
  const probe =
    overrides.probe ??
    (config.healthUrl
      ? new HttpHealthProbe(config.healthUrl, config.health.maxIntervalMs, overrides.fetchImpl)
      : new SupervisorHealthProbe(controller, config.processName))

  const lock = new TransactionLock(paths.lockFile, {
    isAlive: overrides.isAlive,
    now: overrides.now,
    logger: logger('TransactionLock'),
  })
  const journal = new TransactionJournal(paths.journalFile)
  const runtimeView = new RuntimeViewPublisher({
    root: paths.root,
    configFile: paths.runtimeConfigFile,
    pluginsFile: paths.runtimePluginsFile,
    layout,
    logger: logger('RuntimeView'),
  })

  const orchestrator = new Orchestrator({
    paths,
    store,
    registry,
    controller,
    probe,
    lock,
    journal,
    runtimeView,
    processName: config.processName,
    restartTimeoutMs: config.restartTimeoutMs,
    health: config.health,
    sleep: overrides.sleep,
    now: overrides.now,
    clock: overrides.clock,
    logger: logger('Orchestrator'),
  })

  return {
    config,
    paths,
    schema,
    store,
    layout,
    registry,
    controller,
    probe,
    lock,
    journal,
    runtimeView,
    orchestrator,
    logger: logger('Hub'),
  }
}

export interface InitializeResult {
  initialized: boolean
  /** True when values were taken from an existing runtime config file. */
  imported: boolean
}

async function readExistingConfig(file: string): Promise<ConfigDocument['values'] | null> {
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null
    throw err
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new Error(
      `Existing ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}. Fix or remove it and retry.`
    )
  }
  const value = configValueSchema.safeParse(parsed)
  if (!value.success || !isSection(value.data)) {
    throw new Error(`Existing ${file} must contain a JSON object. Fix or remove it and retry.`)
  }
  return value.data
}

/**
 * First-run setup: creates the hub directories and seeds the canonical
 * document from the schema defaults, keeping values from a runtime config
 * file that already exists.
 */
export async function initializeHub(context: HubContext): Promise<InitializeResult> {
  ensureHubDirs(context.paths)
  if (await context.store.exists()) return { initialized: false, imported: false }

  const seed = defaultDocument(context.schema)
  const existing = await readExistingConfig(context.paths.runtimeConfigFile)
  if (existing) {
    mergeMissing(existing, seed.values)
    seed.values = existing
  }
  await context.store.initialize(seed)

  if (!existing) {
    await context.runtimeView.publish(seed, await context.registry.catalog(seed))
  }
  context.logger.info(
    existing
      ? `Imported ${context.paths.runtimeConfigFile} as revision 0`
      : 'Seeded configuration from schema defaults'
  )
  return { initialized: true, imported: existing !== null }
}
