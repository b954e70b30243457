import * as crypto from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { createLogger, type HubPaths, type Logger } from '@scoreboard-hub/config'

import {
  atomicWriteFile,
  computeBufferChecksum,
  fsyncDirectory,
  isErrnoException,
  writeFileDurable,
} from './atomic.js'
import { listBackups, pruneBackups, writeBackup, type BackupEntry } from './backups.js'
import { configDocumentSchema, serializeDocument } from './document.js'
import { CommitError, StaleStageError, StoreUnavailableError } from './errors.js'
import type { ConfigDocument, ConfigSchema, ValidationResult } from './types.js'
import { validateDocument } from './validate.js'

/** Exact canonical bytes as read, for stale detection and byte-identical restore. */
export interface CanonicalSnapshot {
  document: ConfigDocument
  bytes: Buffer
  checksum: string
}

export interface StagedHandle {
  id: string
  path: string
  /** The staged document; its revision is the base revision plus one. */
  document: ConfigDocument
  checksum: string
  baseChecksum: string
  baseRevision: number
}

export interface ConfigStoreOptions {
  statePath: string
  stagingDir: string
  backupsDir: string
  /** Base schema used by `validate` and `initialize` when none is given. */
  schema: ConfigSchema
  backupRetention?: number
  now?: () => Date
  logger?: Logger
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Owns the canonical configuration document. Nothing else writes
 * `statePath`; every change goes through stage and commit.
 */
export class ConfigStore {
  readonly statePath: string
  readonly stagingDir: string
  readonly backupsDir: string
  readonly schema: ConfigSchema
  private readonly backupRetention: number
  private readonly now: () => Date
  private readonly logger: Logger

  constructor(options: ConfigStoreOptions) {
    this.statePath = options.statePath
    this.stagingDir = options.stagingDir
    this.backupsDir = options.backupsDir
    this.schema = options.schema
    this.backupRetention = options.backupRetention ?? 5
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? createLogger('ConfigStore')
  }

  static fromPaths(
    paths: HubPaths,
    schema: ConfigSchema,
    options: Pick<ConfigStoreOptions, 'backupRetention' | 'now' | 'logger'> = {}
  ): ConfigStore {
    return new ConfigStore({
      statePath: paths.statePath,
      stagingDir: paths.stagingDir,
      backupsDir: paths.backupsDir,
      schema,
      ...options,
    })
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.statePath)
      return true
    } catch {
      return false
    }
  }

  async read(): Promise<ConfigDocument> {
    return (await this.readSnapshot()).document
  }

  async readSnapshot(): Promise<CanonicalSnapshot> {
    let bytes: Buffer
    try {
      bytes = await fs.readFile(this.statePath)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new StoreUnavailableError(
          `Canonical configuration not found at ${this.statePath}. Run \`scoreboard-hub status\` to initialize it.`,
          { cause: err }
        )
      }
      throw new StoreUnavailableError(
        `Unable to read canonical configuration ${this.statePath}: ${describeError(err)}`,
        { cause: err }
      )
    }

    let raw: unknown
    try {
      raw = JSON.parse(bytes.toString('utf8'))
    } catch (err) {
      throw new StoreUnavailableError(
        `Canonical configuration ${this.statePath} is not valid JSON: ${describeError(err)}. Restore one of the backups in ${this.backupsDir}.`,
        { cause: err }
      )
    }

    const parsed = configDocumentSchema.safeParse(raw)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const detail = issue ? `${issue.path.join('.') || '(document)'}: ${issue.message}` : ''
      throw new StoreUnavailableError(
        `Canonical configuration ${this.statePath} is not a configuration document (${detail}). Restore one of the backups in ${this.backupsDir}.`
      )
    }

    return { document: parsed.data, bytes, checksum: computeBufferChecksum(bytes) }
  }

  validate(candidate: unknown, schema: ConfigSchema = this.schema): ValidationResult {
    return validateDocument(candidate, schema)
  }

  /**
   * Seeds the canonical document on first run. Returns false when a canonical
   * document already exists; it is never overwritten.
   */
  async initialize(defaults: ConfigDocument): Promise<boolean> {
    if (await this.exists()) return false
    const validation = this.validate(defaults)
    if (!validation.valid) {
      const details = validation.errors.map((e) => `${e.field}: ${e.reason}`).join('; ')
      throw new Error(`Initial configuration is invalid: ${details}`)
    }
    await atomicWriteFile(this.statePath, serializeDocument(defaults))
    this.logger.info(`Initialized canonical configuration at revision ${defaults.revision}`)
    return true
  }

  async readOrInitialize(defaults: ConfigDocument): Promise<ConfigDocument> {
    await this.initialize(defaults)
    return this.read()
  }

  /**
   * Writes the candidate as the next revision into the staging area. The
   * canonical document is untouched until `commit`.
   */
  async stage(candidate: ConfigDocument): Promise<StagedHandle> {
    const base = await this.readSnapshot()
    const document: ConfigDocument = { ...candidate, revision: base.document.revision + 1 }
    const bytes = Buffer.from(serializeDocument(document), 'utf8')
    const { id, stagedPath } = await this.writeStaged(bytes)
    this.logger.debug(`Staged revision ${document.revision}`, { path: stagedPath })
    return {
      id,
      path: stagedPath,
      document,
      checksum: computeBufferChecksum(bytes),
      baseChecksum: base.checksum,
      baseRevision: base.document.revision,
    }
  }

  async commit(handle: StagedHandle): Promise<ConfigDocument> {
    let current: CanonicalSnapshot
    try {
      current = await this.readSnapshot()
    } catch (err) {
      throw new CommitError(
        `Cannot commit revision ${handle.document.revision}: ${describeError(err)}`,
        { cause: err }
      )
    }

    if (current.checksum !== handle.baseChecksum) {
      throw new StaleStageError(
        `Canonical configuration changed after revision ${handle.document.revision} was staged (staged from revision ${handle.baseRevision}, canonical is now revision ${current.document.revision}). Re-read the configuration and retry.`
      )
    }

    let stagedBytes: Buffer
    try {
      stagedBytes = await fs.readFile(handle.path)
    } catch (err) {
      throw new CommitError(`Staged file ${handle.path} is unreadable: ${describeError(err)}`, {
        cause: err,
      })
    }
    if (computeBufferChecksum(stagedBytes) !== handle.checksum) {
      throw new CommitError(`Staged file ${handle.path} changed after it was staged`)
    }

    await this.replaceCanonical(handle.path, current)
    this.logger.info(`Committed revision ${handle.document.revision}`)
    return handle.document
  }

  /** Removes a staged file. Failures are logged, never thrown. */
  async discard(handle: StagedHandle): Promise<void> {
    await this.discardPath(handle.path)
  }

  async discardPath(stagedPath: string): Promise<void> {
    try {
      await fs.rm(stagedPath, { force: true })
    } catch (err) {
      this.logger.warn(`Failed to remove staged file ${stagedPath}: ${describeError(err)}`)
    }
  }

  /** Removes every staged file left in the staging area. */
  async sweepStaging(): Promise<string[]> {
    let names: string[]
    try {
      names = await fs.readdir(this.stagingDir)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return []
      throw err
    }
    const removed: string[] = []
    for (const name of names) {
      const stagedPath = path.join(this.stagingDir, name)
      await this.discardPath(stagedPath)
      removed.push(stagedPath)
    }
    return removed
  }

  /**
   * Makes the canonical file byte-identical to `snapshot`. Returns false when
   * it already was.
   */
  async restore(snapshot: CanonicalSnapshot): Promise<boolean> {
    let current: CanonicalSnapshot | null = null
    try {
      current = await this.readSnapshot()
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err
      this.logger.warn(`Restoring over an unreadable canonical file: ${err.message}`)
    }
    if (current && current.checksum === snapshot.checksum) return false

    const { stagedPath } = await this.writeStaged(snapshot.bytes)
    await this.replaceCanonical(stagedPath, current)
    this.logger.info(`Restored canonical configuration to revision ${snapshot.document.revision}`)
    return true
  }

  async listBackups(): Promise<BackupEntry[]> {
    return listBackups(this.backupsDir)
  }

  private async writeStaged(bytes: Buffer): Promise<{ id: string; stagedPath: string }> {
    await fs.mkdir(this.stagingDir, { recursive: true })
    const id = crypto.randomUUID()
    const stagedPath = path.join(this.stagingDir, `${id}.json`)
    await writeFileDurable(stagedPath, bytes)
    return { id, stagedPath }
  }

  /**
   * Backs up `previous`, renames `stagedPath` over the canonical file and
   * flushes the directory. On failure before the rename the canonical file is
   * untouched and the staged file is removed.
   */
  private async replaceCanonical(
    stagedPath: string,
    previous: CanonicalSnapshot | null
  ): Promise<void> {
    try {
      if (previous && this.backupRetention > 0) {
        await fs.mkdir(this.backupsDir, { recursive: true })
        await writeBackup(this.backupsDir, previous.bytes, previous.document.revision, this.now())
      }
      await fs.rename(stagedPath, this.statePath)
    } catch (err) {
      await this.discardPath(stagedPath)
      throw new CommitError(
        `Failed to replace canonical configuration ${this.statePath}: ${describeError(err)}`,
        { cause: err }
      )
    }

    try {
      await fsyncDirectory(path.dirname(this.statePath))
    } catch (err) {
      this.logger.warn(`Directory sync after commit failed: ${describeError(err)}`)
    }

    try {
      const removed = await pruneBackups(this.backupsDir, this.backupRetention)
      if (removed.length > 0) this.logger.debug(`Pruned ${removed.length} old backup(s)`)
    } catch (err) {
      this.logger.warn(`Failed to prune backups in ${this.backupsDir}: ${describeError(err)}`)
    }
  }
}
