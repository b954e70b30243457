import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { z } from 'zod'

import { createLogger, type Logger } from '@scoreboard-hub/config'
import { isErrnoException } from '@scoreboard-hub/config-store'

const holderSchema = z.object({
  pid: z.number().int(),
  transactionId: z.string(),
  acquiredAt: z.string(),
})

export type LockHolder = z.infer<typeof holderSchema>

export type LockAttempt = { success: true } | { success: false; holder: LockHolder | null }

export interface TransactionLockOptions {
  pid?: number
  isAlive?: (pid: number) => boolean
  now?: () => Date
  logger?: Logger
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM: alive, owned by someone else.
    return isErrnoException(err) && err.code === 'EPERM'
  }
}

/**
 * Serialises transactions against one target. An in-memory flag covers this
 * process; an exclusive lock file covers other hub processes. A lock file
 * left by a dead process is taken over.
 */
export class TransactionLock {
  readonly lockFile: string
  private readonly pid: number
  private readonly isAlive: (pid: number) => boolean
  private readonly now: () => Date
  private readonly logger: Logger
  private held: LockHolder | null = null
  private pending = false

  constructor(lockFile: string, options: TransactionLockOptions = {}) {
    this.lockFile = lockFile
    this.pid = options.pid ?? process.pid
    this.isAlive = options.isAlive ?? isProcessRunning
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? createLogger('TransactionLock')
  }

  get isHeld(): boolean {
    return this.held !== null
  }

  async tryAcquire(transactionId: string): Promise<LockAttempt> {
    if (this.pending || this.held) return { success: false, holder: this.held }
    this.pending = true
    try {
      const holder: LockHolder = {
        pid: this.pid,
        transactionId,
        acquiredAt: this.now().toISOString(),
      }
      if (await this.createLockFile(holder)) {
        this.held = holder
        return { success: true }
      }

      const existing = await this.readHolder()
      if (existing === 'missing') {
        // Released between our attempt and the read.
        if (await this.createLockFile(holder)) {
          this.held = holder
          return { success: true }
        }
        return { success: false, holder: null }
      }
      if (existing === 'corrupt') return { success: false, holder: null }
      if (existing.pid === this.pid || this.isAlive(existing.pid)) {
        return { success: false, holder: existing }
      }

      this.logger.warn(
        `Taking over lock ${this.lockFile} left by dead process ${existing.pid} (transaction ${existing.transactionId})`
      )
      await fs.rm(this.lockFile, { force: true })
      if (await this.createLockFile(holder)) {
        this.held = holder
        return { success: true }
      }
      return { success: false, holder: null }
    } finally {
      this.pending = false
    }
  }

  async release(): Promise<void> {
    if (!this.held) return
    const released = this.held
    this.held = null
    const existing = await this.readHolder()
    if (existing !== 'missing' && existing !== 'corrupt' && existing.transactionId !== released.transactionId) {
      this.logger.warn(`Lock ${this.lockFile} now belongs to transaction ${existing.transactionId}; leaving it`)
      return
    }
    await fs.rm(this.lockFile, { force: true })
  }

  /** The holder recorded in the lock file, whoever it is. */
  async inspect(): Promise<LockHolder | 'missing' | 'corrupt'> {
    return this.readHolder()
  }

  private async createLockFile(holder: LockHolder): Promise<boolean> {
    await fs.mkdir(path.dirname(this.lockFile), { recursive: true })
    let handle: fs.FileHandle
    try {
      handle = await fs.open(this.lockFile, 'wx')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') return false
      throw err
    }
    try {
      await handle.writeFile(`${JSON.stringify(holder)}\n`, 'utf8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    return true
  }

  private async readHolder(): Promise<LockHolder | 'missing' | 'corrupt'> {
    let raw: string
    try {
      raw = await fs.readFile(this.lockFile, 'utf8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return 'missing'
      throw err
    }
    try {
      const parsed = holderSchema.safeParse(JSON.parse(raw))
      return parsed.success ? parsed.data : 'corrupt'
    } catch {
      return 'corrupt'
    }
  }
}
