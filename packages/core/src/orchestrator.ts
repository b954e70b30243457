import {
  createLogger,
  readScoreboardVersion,
  type HealthPolicy,
  type HubPaths,
  type Logger,
} from '@scoreboard-hub/config'
import {
  cloneDocument,
  documentsEqual,
  KeyPathError,
  setPath,
  StoreUnavailableError,
  unsetPath,
  type CanonicalSnapshot,
  type ConfigDocument,
  type ConfigStore,
  type StagedHandle,
} from '@scoreboard-hub/config-store'
import type {
  BoardInfo,
  PluginCatalog,
  PluginListing,
  PluginPackage,
  PluginRegistry,
  RegistryError,
} from '@scoreboard-hub/plugin-registry'
import {
  verifyHealth,
  withTimeout,
  type HealthProbe,
  type ProcessController,
  type ProcessInfo,
  type ProcessStatus,
  type RestartError,
  type RestartResult,
} from '@scoreboard-hub/process-control'

import type { ChangeError, UnrecoverableTrigger } from './errors.js'
import type { JournalEntry, PluginTransition, TransactionJournal } from './journal.js'
import type { LockHolder, TransactionLock } from './lock.js'
import { describeMutation, type Mutation } from './mutation.js'
import type { RuntimeViewPublisher } from './runtime-view.js'
import { Transaction, type TransactionState } from './transaction.js'
import { newTransactionId } from './transaction-id.js'

export type ChangeOutcome =
  | {
      status: 'committed'
      transactionId: string
      /** False when the change left the document as it was; nothing was restarted. */
      changed: boolean
      revision: number
      history: TransactionState[]
    }
  | {
      status: 'rolled-back'
      transactionId: string
      error: ChangeError
      history: TransactionState[]
    }
  | {
      status: 'rejected'
      transactionId: null
      error: Extract<ChangeError, { code: 'TransactionBusy' }>
      history: TransactionState[]
    }

export interface ApplyChangeOptions {
  /** Honoured until the restart is issued. */
  signal?: AbortSignal
}

export interface RecoveryReport {
  status: 'clean' | 'recovered' | 'busy'
  transactionId: string | null
  removedStagedFiles: string[]
  removedPluginDirs: string[]
  restart: RestartResult | null
}

export type ProcessAction = 'start' | 'stop'

export type ProcessActionOutcome =
  | { status: 'done'; action: ProcessAction; processName: string; processStatus: ProcessStatus }
  | { status: 'failed'; action: ProcessAction; processName: string; message: string }
  | {
      status: 'rejected'
      action: ProcessAction
      processName: string
      error: Extract<ChangeError, { code: 'TransactionBusy' }>
    }

export interface HubStatus {
  scoreboardVersion: string
  processName: string
  processStatus: ProcessStatus
  /** Null when the canonical document cannot be read. */
  revision: number | null
  storeProblem: string | null
  pendingTransaction: JournalEntry | null
  journalProblem: string | null
  lockHolder: LockHolder | null
}

export interface OrchestratorOptions {
  paths: HubPaths
  store: ConfigStore
  registry: PluginRegistry
  controller: ProcessController
  probe: HealthProbe
  lock: TransactionLock
  journal: TransactionJournal
  runtimeView: RuntimeViewPublisher
  processName: string
  restartTimeoutMs: number
  health: HealthPolicy
  sleep?: (ms: number) => Promise<void>
  /** Wall clock for timestamps. */
  now?: () => Date
  /** Millisecond clock for health-check timing. */
  clock?: () => number
  logger?: Logger
}

interface FileWork {
  write: PluginPackage[]
  removePlugins: string[]
  removeVersions: Array<{ id: string; version: string }>
}

type MutationResult = { success: true; work: FileWork } | { success: false; error: ChangeError }

/** State of one transaction past `open`, threaded through the rollback helpers. */
interface RunContext {
  tx: Transaction
  snapshot: CanonicalSnapshot
  catalog: PluginCatalog
  handle: StagedHandle | null
  createdDirs: string[]
  published: boolean
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function toChangeError(error: RegistryError): ChangeError {
  if (error.code === 'MissingDependency') {
    return { code: 'DependencyUnresolved', id: error.id, requiredBy: error.requiredBy }
  }
  return error
}

function busy(holder: LockHolder | null): Extract<ChangeError, { code: 'TransactionBusy' }> {
  return {
    code: 'TransactionBusy',
    holder: holder ? `transaction ${holder.transactionId}, pid ${holder.pid}` : null,
  }
}

function sameIncarnation(a: ProcessInfo, b: ProcessInfo): boolean {
  return a.pid === b.pid && a.startedAt === b.startedAt && a.state === b.state
}

function pluginTransitions(before: ConfigDocument, after: ConfigDocument): PluginTransition[] {
  const ids = [...new Set([...Object.keys(before.plugins), ...Object.keys(after.plugins)])].sort()
  return ids.flatMap((id) => {
    const from = before.plugins[id]
    const to = after.plugins[id]
    if (from?.state === to?.state && from?.version === to?.version) return []
    return [{ id, from: from?.state ?? null, to: to?.state ?? null }]
  })
}

/**
 * Runs every change to the scoreboard as a transaction: stage, restart,
 * verify, then commit or roll back. Only the orchestrator restarts the
 * target process.
 */
export class Orchestrator {
  private readonly paths: HubPaths
  private readonly store: ConfigStore
  private readonly registry: PluginRegistry
  private readonly controller: ProcessController
  private readonly probe: HealthProbe
  private readonly lock: TransactionLock
  private readonly journal: TransactionJournal
  private readonly runtimeView: RuntimeViewPublisher
  private readonly processName: string
  private readonly restartTimeoutMs: number
  private readonly health: HealthPolicy
  private readonly sleep: ((ms: number) => Promise<void>) | undefined
  private readonly now: () => Date
  private readonly clock: () => number
  private readonly logger: Logger

  constructor(options: OrchestratorOptions) {
    this.paths = options.paths
    this.store = options.store
    this.registry = options.registry
    this.controller = options.controller
    this.probe = options.probe
    this.lock = options.lock
    this.journal = options.journal
    this.runtimeView = options.runtimeView
    this.processName = options.processName
    this.restartTimeoutMs = options.restartTimeoutMs
    this.health = options.health
    this.sleep = options.sleep
    this.now = options.now ?? (() => new Date())
    this.clock = options.clock ?? Date.now
    this.logger = options.logger ?? createLogger('Orchestrator')
  }

  async applyChange(mutation: Mutation, options: ApplyChangeOptions = {}): Promise<ChangeOutcome> {
    const transactionId = newTransactionId()
    const acquired = await this.lock.tryAcquire(transactionId)
    if (!acquired.success) {
      this.logger.warn(`Rejected ${describeMutation(mutation)}: another transaction holds the lock`)
      return {
        status: 'rejected',
        transactionId: null,
        error: busy(acquired.holder),
        history: [],
      }
    }

    const tx = new Transaction(transactionId, mutation.kind, (transaction, from, to) => {
      this.logger.debug(`Transaction ${transaction.id}: ${from} -> ${to}`)
    })
    this.logger.info(`Transaction ${transactionId} opened: ${describeMutation(mutation)}`)
    try {
      const outcome = await this.run(tx, mutation, options.signal)
      if (outcome.status === 'committed') {
        this.logger.info(`Transaction ${transactionId} committed revision ${outcome.revision}`)
      } else {
        this.logger.warn(`Transaction ${transactionId} rolled back: ${outcome.error.code}`)
      }
      return outcome
    } finally {
      try {
        await this.journal.clear()
      } catch (err) {
        this.logger.error(`Failed to clear journal ${this.journal.file}`, err)
      }
      await this.lock.release()
    }
  }

  /** Canonical configuration. Never waits for a running transaction. */
  async readConfig(): Promise<ConfigDocument> {
    return this.store.read()
  }

  async listPlugins(): Promise<PluginListing[]> {
    return this.registry.listings(await this.store.read())
  }

  async listBoards(): Promise<BoardInfo[]> {
    return this.registry.listBoards(await this.store.read())
  }

  /** Every process supervisord manages. Never waits for a running transaction. */
  async listProcesses(): Promise<ProcessInfo[]> {
    return this.controller.listProcesses()
  }

  /**
   * Starts or stops the target outside of a configuration change. Holds the
   * transaction lock, so it is refused while a change is in flight.
   */
  async controlTarget(action: ProcessAction): Promise<ProcessActionOutcome> {
    const processName = this.processName
    const acquired = await this.lock.tryAcquire(newTransactionId())
    if (!acquired.success) {
      this.logger.warn(`Refused to ${action} ${processName}: another transaction holds the lock`)
      return { status: 'rejected', action, processName, error: busy(acquired.holder) }
    }

    try {
      this.logger.info(`${action === 'start' ? 'Starting' : 'Stopping'} ${processName}`)
      const work =
        action === 'start' ? this.controller.start(processName) : this.controller.stop(processName)
      await withTimeout(
        work,
        this.restartTimeoutMs,
        `${processName} did not ${action} within ${this.restartTimeoutMs}ms`
      )
      return {
        status: 'done',
        action,
        processName,
        processStatus: await this.controller.status(processName),
      }
    } catch (err) {
      const message = describeError(err)
      this.logger.warn(`Could not ${action} ${processName}: ${message}`)
      return { status: 'failed', action, processName, message }
    } finally {
      await this.lock.release()
    }
  }

  async status(): Promise<HubStatus> {
    let revision: number | null = null
    let storeProblem: string | null = null
    try {
      revision = (await this.store.read()).revision
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err
      storeProblem = err.message
    }

    let pendingTransaction: JournalEntry | null = null
    let journalProblem: string | null = null
    try {
      pendingTransaction = await this.journal.read()
    } catch (err) {
      journalProblem = describeError(err)
    }

    const holder = await this.lock.inspect()
    return {
      scoreboardVersion: readScoreboardVersion(this.paths),
      processName: this.processName,
      processStatus: await this.controller.status(this.processName),
      revision,
      storeProblem,
      pendingTransaction,
      journalProblem,
      lockHolder: holder === 'missing' || holder === 'corrupt' ? null : holder,
    }
  }

  /**
   * Resolves a transaction a crashed hub left behind: removes its staged
   * files and plugin directories, republishes the canonical runtime view and
   * restarts the target once.
   */
  async recover(): Promise<RecoveryReport> {
    const recoveryId = newTransactionId()
    const acquired = await this.lock.tryAcquire(recoveryId)
    if (!acquired.success) {
      return {
        status: 'busy',
        transactionId: acquired.holder?.transactionId ?? null,
        removedStagedFiles: [],
        removedPluginDirs: [],
        restart: null,
      }
    }

    try {
      let entry: JournalEntry | null = null
      try {
        entry = await this.journal.read()
      } catch (err) {
        this.logger.warn(`Journal is unreadable; recovering without it: ${describeError(err)}`)
      }
      const removedStagedFiles = await this.store.sweepStaging()
      const journalPresent = entry !== null || (await this.journal.exists())
      if (!journalPresent) {
        return {
          status: 'clean',
          transactionId: null,
          removedStagedFiles,
          removedPluginDirs: [],
          restart: null,
        }
      }

      const document = await this.store.read()
      const referenced = new Set(
        Object.entries(document.plugins).map(([id, record]) =>
          this.registry.layout.versionDir(id, record.version)
        )
      )
      const removedPluginDirs = (entry?.createdDirs ?? []).filter((dir) => !referenced.has(dir))
      await this.registry.discardStagedFiles(removedPluginDirs)

      await this.runtimeView.publish(document, await this.registry.catalog(document))
      const restart = await this.controller.restart(this.processName, this.restartTimeoutMs)
      await this.journal.clear()

      this.logger.info(`Recovered from interrupted transaction ${entry?.transactionId ?? '(unknown)'}`)
      return {
        status: 'recovered',
        transactionId: entry?.transactionId ?? null,
        removedStagedFiles,
        removedPluginDirs,
        restart,
      }
    } finally {
      await this.lock.release()
    }
  }

  private async run(
    tx: Transaction,
    mutation: Mutation,
    signal: AbortSignal | undefined
  ): Promise<ChangeOutcome> {
    let snapshot: CanonicalSnapshot
    try {
      snapshot = await this.store.readSnapshot()
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err
      return this.rolledBack(tx, { code: 'StoreUnavailable', message: err.message })
    }
    if (signal?.aborted) return this.rolledBack(tx, { code: 'Cancelled' })

    const catalog = await this.registry.catalog(snapshot.document)
    const staged = cloneDocument(snapshot.document)
    const stagedCatalog = catalog.clone()
    const appliedAt = this.now().toISOString()

    const applied = await this.applyMutation(mutation, staged, stagedCatalog, catalog, appliedAt)
    if (!applied.success) return this.rolledBack(tx, applied.error)
    staged.plugins = stagedCatalog.toSection()

    const validation = this.store.validate(staged, stagedCatalog.effectiveSchema())
    if (!validation.valid) {
      const [first] = validation.errors
      return this.rolledBack(tx, {
        code: 'ValidationError',
        field: first?.field ?? '(document)',
        reason: first?.reason ?? 'invalid',
        issues: validation.errors,
      })
    }
    tx.transition('validated')

    const { work } = applied
    if (documentsEqual(staged, snapshot.document) && work.write.length === 0) {
      tx.transition('committed')
      return {
        status: 'committed',
        transactionId: tx.id,
        changed: false,
        revision: snapshot.document.revision,
        history: tx.history,
      }
    }
    if (signal?.aborted) return this.rolledBack(tx, { code: 'Cancelled' })

    tx.transition('applying')
    const ctx: RunContext = {
      tx,
      snapshot,
      catalog,
      handle: null,
      createdDirs: [],
      published: false,
    }

    try {
      ctx.handle = await this.store.stage(staged)
      await this.writeJournal(ctx, mutation, staged)
      for (const pkg of work.write) {
        ctx.createdDirs.push(await this.registry.stageFiles(pkg, appliedAt))
        await this.writeJournal(ctx, mutation, staged)
      }
      ctx.published = true
      await this.runtimeView.publish(ctx.handle.document, stagedCatalog)
    } catch (err) {
      this.logger.error(`Staging transaction ${tx.id} failed`, err)
      return this.abortBeforeRestart(ctx, 'StagingFailed', {
        code: 'StagingFailed',
        message: `Could not stage the change: ${describeError(err)}`,
      })
    }

    if (signal?.aborted) return this.abortBeforeRestart(ctx, 'Cancelled', { code: 'Cancelled' })

    const incarnation = await this.observeTarget()
    const restart = await this.controller.restart(this.processName, this.restartTimeoutMs)
    if (!restart.success) return this.abortFailedRestart(ctx, incarnation, restart.error)

    tx.transition('verifying')
    const report = await verifyHealth(this.probe, this.health, {
      sleep: this.sleep,
      now: this.clock,
      logger: this.logger,
    })
    if (!report.healthy) {
      const rollback = await this.rollbackAfterRestart(ctx)
      if (rollback.problems.length > 0) {
        return this.rolledBack(tx, this.unrecoverable('HealthCheckFailed', rollback.problems))
      }
      return this.rolledBack(tx, {
        code: 'HealthCheckFailed',
        attempts: report.attempts,
        rollbackRestarted: rollback.restarted,
        lastError: report.lastError,
      })
    }

    let committed: ConfigDocument
    try {
      committed = await this.store.commit(ctx.handle)
    } catch (err) {
      this.logger.error(`Commit of transaction ${tx.id} failed`, err)
      const rollback = await this.rollbackAfterRestart(ctx)
      if (rollback.problems.length > 0) {
        return this.rolledBack(tx, this.unrecoverable('CommitFailed', rollback.problems))
      }
      return this.rolledBack(tx, {
        code: 'CommitFailed',
        message: describeError(err),
        rollbackRestarted: rollback.restarted,
      })
    }

    tx.transition('committed')
    await this.finalizeFiles(work)
    return {
      status: 'committed',
      transactionId: tx.id,
      changed: true,
      revision: committed.revision,
      history: tx.history,
    }
  }

  private async applyMutation(
    mutation: Mutation,
    staged: ConfigDocument,
    catalog: PluginCatalog,
    canonical: PluginCatalog,
    appliedAt: string
  ): Promise<MutationResult> {
    const work: FileWork = { write: [], removePlugins: [], removeVersions: [] }

    switch (mutation.kind) {
      case 'set-config': {
        for (const [key, value] of Object.entries(mutation.values)) {
          try {
            setPath(staged.values, key, value)
          } catch (err) {
            const field = err instanceof KeyPathError ? err.key : key
            return { success: false, error: this.inputError(field, describeError(err)) }
          }
        }
        for (const key of mutation.unset ?? []) {
          try {
            unsetPath(staged.values, key)
          } catch (err) {
            return { success: false, error: this.inputError(key, describeError(err)) }
          }
        }
        return { success: true, work }
      }

      case 'replace-config':
        staged.values = structuredClone(mutation.values)
        return { success: true, work }

      case 'enable-plugin': {
        const plan = catalog.planEnable(mutation.id)
        if (!plan.success) return { success: false, error: toChangeError(plan.error) }
        catalog.applyEnable(plan.value, staged.values, appliedAt)
        return { success: true, work }
      }

      case 'disable-plugin': {
        const plan = catalog.planDisable(mutation.id)
        if (!plan.success) return { success: false, error: toChangeError(plan.error) }
        catalog.applyDisable(plan.value, appliedAt)
        return { success: true, work }
      }

      case 'install-plugin': {
        const pkg = mutation.package
        const installed = catalog.install(pkg, appliedAt)
        if (!installed.success) return { success: false, error: installed.error }
        const collision = await this.registry.checkFileCollision(pkg.manifest, canonical)
        if (collision) return { success: false, error: collision }
        work.write.push(pkg)
        return { success: true, work }
      }

      case 'upgrade-plugin': {
        const pkg = mutation.package
        const upgraded = catalog.upgrade(pkg, staged.values, appliedAt)
        if (!upgraded.success) return { success: false, error: upgraded.error }
        const collision = await this.registry.checkFileCollision(pkg.manifest, canonical)
        if (collision) return { success: false, error: collision }
        work.write.push(pkg)
        work.removeVersions.push({ id: pkg.manifest.id, version: upgraded.value.previousVersion })
        return { success: true, work }
      }

      case 'uninstall-plugin': {
        const removed = catalog.uninstall(
          mutation.id,
          { keepConfig: mutation.keepConfig ?? false },
          staged.values
        )
        if (!removed.success) return { success: false, error: removed.error }
        work.removePlugins.push(mutation.id)
        return { success: true, work }
      }
    }
  }

  private inputError(field: string, reason: string): ChangeError {
    return { code: 'ValidationError', field, reason, issues: [{ field, reason }] }
  }

  private async writeJournal(ctx: RunContext, mutation: Mutation, staged: ConfigDocument): Promise<void> {
    if (!ctx.handle) return
    await this.journal.write({
      transactionId: ctx.tx.id,
      mutation: describeMutation(mutation),
      startedAt: this.now().toISOString(),
      stagedPath: ctx.handle.path,
      createdDirs: [...ctx.createdDirs],
      transitions: pluginTransitions(ctx.snapshot.document, staged),
    })
  }

  /**
   * Undoes staging before any restart was issued. The scoreboard never ran
   * the staged change, so republishing the canonical view is enough.
   */
  private async abortBeforeRestart(
    ctx: RunContext,
    trigger: UnrecoverableTrigger,
    error: ChangeError
  ): Promise<ChangeOutcome> {
    const problems = await this.undoStaged(ctx)
    if (problems.length > 0) return this.rolledBack(ctx.tx, this.unrecoverable(trigger, problems))
    return this.rolledBack(ctx.tx, error)
  }

  /**
   * A failed restart may still have stopped the target or respawned it on the
   * staged view. The previous configuration is only reported in place when
   * the target is still the incarnation seen before the restart; otherwise it
   * gets the one rollback restart.
   */
  private async abortFailedRestart(
    ctx: RunContext,
    before: ProcessInfo | null,
    failure: RestartError
  ): Promise<ChangeOutcome> {
    const problems = await this.undoStaged(ctx)
    if (problems.length > 0) {
      return this.rolledBack(ctx.tx, this.unrecoverable('RestartFailed', problems))
    }

    const after = await this.observeTarget()
    if (before && after && sameIncarnation(before, after)) {
      return this.rolledBack(ctx.tx, {
        code: 'RestartFailed',
        cause: failure.code,
        message: failure.message,
        rollbackRestarted: false,
      })
    }

    this.logger.warn(
      `${this.processName} may have started on the staged change; restarting it on revision ${ctx.snapshot.document.revision}`
    )
    const restart = await this.controller.restart(this.processName, this.restartTimeoutMs)
    if (!restart.success) {
      return this.rolledBack(
        ctx.tx,
        this.unrecoverable('RestartFailed', [`rollback restart failed: ${restart.error.message}`])
      )
    }
    return this.rolledBack(ctx.tx, {
      code: 'RestartFailed',
      cause: failure.code,
      message: failure.message,
      rollbackRestarted: true,
    })
  }

  /** The target's current incarnation, or null when supervisord cannot say in time. */
  private async observeTarget(): Promise<ProcessInfo | null> {
    try {
      return await withTimeout(
        this.controller.describe(this.processName),
        this.restartTimeoutMs,
        `supervisor did not describe ${this.processName} within ${this.restartTimeoutMs}ms`
      )
    } catch (err) {
      this.logger.warn(`Could not read the state of ${this.processName}: ${describeError(err)}`)
      return null
    }
  }

  /** Restores the snapshot and issues exactly one rollback restart. */
  private async rollbackAfterRestart(
    ctx: RunContext
  ): Promise<{ restarted: boolean; problems: string[] }> {
    const problems: string[] = []
    try {
      await this.store.restore(ctx.snapshot)
    } catch (err) {
      problems.push(`restoring revision ${ctx.snapshot.document.revision} failed: ${describeError(err)}`)
    }
    problems.push(...(await this.undoStaged(ctx)))

    this.logger.warn(`Rolling back transaction ${ctx.tx.id}; restarting ${this.processName}`)
    const restart = await this.controller.restart(this.processName, this.restartTimeoutMs)
    if (!restart.success) {
      problems.push(`rollback restart failed: ${restart.error.message}`)
    }
    return { restarted: restart.success, problems }
  }

  /** Removes staged state. Returns what could not be put back for the scoreboard. */
  private async undoStaged(ctx: RunContext): Promise<string[]> {
    const problems: string[] = []
    if (ctx.handle) await this.store.discard(ctx.handle)
    try {
      await this.registry.discardStagedFiles(ctx.createdDirs)
    } catch (err) {
      this.logger.warn(`Leaving staged plugin files behind: ${describeError(err)}`)
    }
    if (ctx.published) {
      try {
        await this.runtimeView.publish(ctx.snapshot.document, ctx.catalog)
      } catch (err) {
        problems.push(`republishing the previous runtime view failed: ${describeError(err)}`)
      }
    }
    return problems
  }

  /** Removes files the committed revision no longer refers to. */
  private async finalizeFiles(work: FileWork): Promise<void> {
    for (const { id, version } of work.removeVersions) {
      try {
        await this.registry.removePluginVersion(id, version)
      } catch (err) {
        this.logger.warn(`Could not remove superseded ${id}@${version}: ${describeError(err)}`)
      }
    }
    for (const id of work.removePlugins) {
      try {
        await this.registry.removePluginFiles(id)
      } catch (err) {
        this.logger.warn(`Could not remove files of uninstalled ${id}: ${describeError(err)}`)
      }
    }
  }

  private unrecoverable(trigger: UnrecoverableTrigger, problems: string[]): ChangeError {
    const message = `Rollback after ${trigger} did not complete: ${problems.join('; ')}`
    this.logger.error(message)
    return { code: 'Unrecoverable', trigger, message }
  }

  private rolledBack(tx: Transaction, error: ChangeError): ChangeOutcome {
    tx.transition('rolled-back')
    return { status: 'rolled-back', transactionId: tx.id, error, history: tx.history }
  }
}
