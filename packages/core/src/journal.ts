import * as fs from 'node:fs/promises'
import { z } from 'zod'

import { atomicWriteFile, isErrnoException } from '@scoreboard-hub/config-store'

const pluginStateSchema = z.enum(['disabled', 'enabled', 'failed']).nullable()

const journalEntrySchema = z.object({
  transactionId: z.string(),
  mutation: z.string(),
  startedAt: z.string(),
  stagedPath: z.string(),
  /** Plugin version directories this transaction wrote. */
  createdDirs: z.array(z.string()),
  transitions: z.array(
    z.object({
      id: z.string(),
      from: pluginStateSchema,
      to: pluginStateSchema,
    })
  ),
})

export type JournalEntry = z.infer<typeof journalEntrySchema>
export type PluginTransition = JournalEntry['transitions'][number]

/** Side file describing the transaction in flight, for crash recovery. */
export class TransactionJournal {
  readonly file: string

  constructor(file: string) {
    this.file = file
  }

  async write(entry: JournalEntry): Promise<void> {
    await atomicWriteFile(this.file, `${JSON.stringify(entry, null, 2)}\n`)
  }

  async read(): Promise<JournalEntry | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.file, 'utf8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null
      throw err
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new Error(
        `Pending-transaction journal ${this.file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      )
    }
    const result = journalEntrySchema.safeParse(parsed)
    if (!result.success) {
      throw new Error(`Pending-transaction journal ${this.file} is not a journal entry`)
    }
    return result.data
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.file)
      return true
    } catch {
      return false
    }
  }

  async clear(): Promise<void> {
    await fs.rm(this.file, { force: true })
  }
}
