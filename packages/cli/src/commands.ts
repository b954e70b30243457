import { readFile } from 'node:fs/promises'
import process from 'node:process'

import { configValueSchema, getPath, isSection } from '@scoreboard-hub/config-store'
import {
  formatChangeError,
  isProcessRunning,
  type ChangeOutcome,
  type HubContextOverrides,
  type Mutation,
  type ProcessAction,
} from '@scoreboard-hub/core'
import { loadPluginPackage, type PluginPackage } from '@scoreboard-hub/plugin-registry'

import {
  describeOutcome,
  describeProcessAction,
  EXIT_BUSY,
  EXIT_UNRECOVERABLE,
  exitCodeFor,
  openHub,
  parseAssignment,
  renderBoard,
  renderListing,
  renderProcess,
  renderRecovery,
  renderStatus,
  type GlobalOptions,
} from './lib/index.js'

export interface CommandContext {
  options: GlobalOptions
  overrides?: HubContextOverrides
}

interface DoctorCheck {
  name: string
  ok: boolean
  detail: string
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Runs one change; Ctrl-C cancels it until the scoreboard is restarted. */
async function applyAndReport(ctx: CommandContext, mutation: Mutation): Promise<ChangeOutcome> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const abort = new AbortController()
  const onInterrupt = () => {
    abort.abort()
  }
  process.once('SIGINT', onInterrupt)
  let outcome: ChangeOutcome
  try {
    outcome = await hub.orchestrator.applyChange(mutation, { signal: abort.signal })
  } finally {
    process.off('SIGINT', onInterrupt)
  }

  if (ctx.options.json) {
    printJson(outcome)
  } else if (outcome.status === 'committed') {
    console.log(describeOutcome(outcome))
  } else {
    console.error(`error: ${describeOutcome(outcome)}`)
  }
  process.exitCode = exitCodeFor(outcome)
  return outcome
}

async function loadPackage(source: string): Promise<PluginPackage> {
  const loaded = await loadPluginPackage(source)
  if (!loaded.success) {
    throw new Error(formatChangeError({ code: 'BadManifest', issues: loaded.issues }))
  }
  return loaded.package
}

export async function commandStatus(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const status = await hub.orchestrator.status()
  if (ctx.options.json) {
    printJson(status)
    return
  }
  for (const line of renderStatus(status)) console.log(line)
}

export async function commandConfigGet(ctx: CommandContext, key?: string): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const document = await hub.orchestrator.readConfig()
  const value = key ? getPath(document.values, key) : document.values
  if (value === undefined) {
    throw new Error(`${key} is not set`)
  }
  if (typeof value === 'string' && !ctx.options.json) {
    console.log(value)
    return
  }
  printJson(value)
}

export async function commandConfigSet(ctx: CommandContext, assignments: string[]): Promise<void> {
  const values = Object.fromEntries(assignments.map(parseAssignment))
  await applyAndReport(ctx, { kind: 'set-config', values })
}

export async function commandConfigUnset(ctx: CommandContext, keys: string[]): Promise<void> {
  await applyAndReport(ctx, { kind: 'set-config', values: {}, unset: keys })
}

export async function commandConfigReplace(ctx: CommandContext, file: string): Promise<void> {
  const raw = await readFile(file, 'utf8')
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new Error(`${file} is not valid JSON: ${describeError(err)}`)
  }
  const value = configValueSchema.safeParse(parsed)
  if (!value.success || !isSection(value.data)) {
    throw new Error(`${file} must contain a JSON object`)
  }
  await applyAndReport(ctx, { kind: 'replace-config', values: value.data })
}

export async function commandConfigValidate(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const document = await hub.store.read()
  const catalog = await hub.registry.catalog(document)
  const result = hub.store.validate(document, catalog.effectiveSchema())
  if (ctx.options.json) {
    printJson({ revision: document.revision, ...result })
  } else if (result.valid) {
    console.log(`ok  revision ${document.revision} is valid`)
  } else {
    for (const error of result.errors) console.log(`bad ${error.field}: ${error.reason}`)
  }
  if (!result.valid) process.exitCode = 1
}

export async function commandPluginsList(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const listings = await hub.orchestrator.listPlugins()
  if (ctx.options.json) {
    printJson(listings)
    return
  }
  if (listings.length === 0) {
    console.log('No plugins installed or indexed.')
    return
  }
  for (const listing of listings) console.log(renderListing(listing))
}

export async function commandPluginsInstall(ctx: CommandContext, source: string): Promise<void> {
  await applyAndReport(ctx, { kind: 'install-plugin', package: await loadPackage(source) })
}

export async function commandPluginsUpgrade(ctx: CommandContext, source: string): Promise<void> {
  await applyAndReport(ctx, { kind: 'upgrade-plugin', package: await loadPackage(source) })
}

export async function commandPluginsEnable(ctx: CommandContext, id: string): Promise<void> {
  await applyAndReport(ctx, { kind: 'enable-plugin', id })
}

export async function commandPluginsDisable(ctx: CommandContext, id: string): Promise<void> {
  await applyAndReport(ctx, { kind: 'disable-plugin', id })
}

export async function commandPluginsUninstall(
  ctx: CommandContext,
  id: string,
  options: { keepConfig?: boolean }
): Promise<void> {
  await applyAndReport(ctx, {
    kind: 'uninstall-plugin',
    id,
    keepConfig: options.keepConfig ?? false,
  })
}

export async function commandBoards(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const boards = await hub.orchestrator.listBoards()
  if (ctx.options.json) {
    printJson(boards)
    return
  }
  for (const board of boards) console.log(renderBoard(board))
}

export async function commandBackups(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const backups = await hub.store.listBackups()
  if (ctx.options.json) {
    printJson(backups)
    return
  }
  if (backups.length === 0) {
    console.log('No backups yet.')
    return
  }
  for (const backup of backups) {
    console.log(`revision ${backup.revision}  ${backup.createdAt}  ${backup.path}`)
  }
}

export async function commandProcesses(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides, false)
  const processes = await hub.orchestrator.listProcesses()
  if (ctx.options.json) {
    printJson(processes)
    return
  }
  for (const info of processes) console.log(renderProcess(info))
}

export async function commandControl(ctx: CommandContext, action: ProcessAction): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const outcome = await hub.orchestrator.controlTarget(action)
  if (ctx.options.json) {
    printJson(outcome)
  } else if (outcome.status === 'done') {
    console.log(describeProcessAction(outcome))
  } else {
    console.error(`error: ${describeProcessAction(outcome)}`)
  }
  if (outcome.status === 'rejected') {
    process.exitCode = EXIT_BUSY
  } else if (outcome.status === 'failed') {
    process.exitCode = 1
  }
}

export async function commandRecover(ctx: CommandContext): Promise<void> {
  const hub = await openHub(ctx.options, ctx.overrides)
  const report = await hub.orchestrator.recover()
  if (ctx.options.json) {
    printJson(report)
  } else {
    for (const line of renderRecovery(report)) console.log(line)
  }
  if (report.status === 'busy') {
    process.exitCode = EXIT_BUSY
  } else if (report.restart && !report.restart.success) {
    process.exitCode = EXIT_UNRECOVERABLE
  }
}

export async function commandLogs(ctx: CommandContext, options: { bytes?: string }): Promise<void> {
  const bytes = options.bytes ? Number.parseInt(options.bytes, 10) : 4000
  if (!Number.isFinite(bytes) || bytes <= 0) {
    throw new Error(`Invalid --bytes value: ${options.bytes}`)
  }
  const hub = await openHub(ctx.options, ctx.overrides, false)
  const text = await hub.controller.tailStderr(hub.config.processName, bytes)
  process.stdout.write(text.endsWith('\n') || text === '' ? text : `${text}\n`)
}

async function doctorChecks(ctx: CommandContext): Promise<DoctorCheck[]> {
  const hub = await openHub(ctx.options, ctx.overrides, false)
  const isAlive = ctx.overrides?.isAlive ?? isProcessRunning
  const checks: DoctorCheck[] = []

  try {
    const document = await hub.store.read()
    checks.push({ name: 'canonical configuration', ok: true, detail: `revision ${document.revision}` })
    const catalog = await hub.registry.catalog(document)
    const result = hub.store.validate(document, catalog.effectiveSchema())
    checks.push({
      name: 'configuration valid',
      ok: result.valid,
      detail: result.valid
        ? 'all fields pass'
        : result.errors.map((error) => `${error.field}: ${error.reason}`).join('; '),
    })
    const audit = await hub.registry.audit(document)
    const problems = [
      ...audit.orphanDirectories.map((dir) => `${dir} has no record`),
      ...audit.strayVersions.map((dir) => `${dir} is not the recorded version`),
      ...audit.damaged.map((entry) => `${entry.id}@${entry.version}: ${entry.problems.join(', ')}`),
    ]
    checks.push({
      name: 'plugin files',
      ok: problems.length === 0,
      detail: problems.length === 0 ? 'match the canonical records' : problems.join('; '),
    })
  } catch (err) {
    checks.push({ name: 'canonical configuration', ok: false, detail: describeError(err) })
  }

  try {
    const pending = await hub.journal.read()
    checks.push({
      name: 'pending transaction',
      ok: pending === null,
      detail: pending
        ? `${pending.transactionId} (${pending.mutation}) was interrupted; run \`scoreboard-hub recover\``
        : 'none',
    })
  } catch (err) {
    checks.push({ name: 'pending transaction', ok: false, detail: describeError(err) })
  }

  const holder = await hub.lock.inspect()
  if (holder === 'missing') {
    checks.push({ name: 'transaction lock', ok: true, detail: 'free' })
  } else if (holder === 'corrupt') {
    checks.push({ name: 'transaction lock', ok: false, detail: `${hub.lock.lockFile} is unreadable` })
  } else {
    const alive = isAlive(holder.pid)
    checks.push({
      name: 'transaction lock',
      ok: alive,
      detail: alive
        ? `held by transaction ${holder.transactionId}, pid ${holder.pid}`
        : `left by pid ${holder.pid}, which is not running`,
    })
  }

  const processStatus = await hub.controller.status(hub.config.processName)
  checks.push({
    name: 'scoreboard process',
    ok: processStatus === 'running',
    detail: `${hub.config.processName} is ${processStatus}`,
  })
  return checks
}

export async function commandDoctor(ctx: CommandContext): Promise<void> {
  const checks = await doctorChecks(ctx)
  if (ctx.options.json) {
    printJson(checks)
  } else {
    for (const check of checks) {
      console.log(`${check.ok ? 'ok ' : 'bad'} ${check.name}: ${check.detail}`)
    }
  }
  if (checks.some((check) => !check.ok)) {
    process.exitCode = 1
  }
}
