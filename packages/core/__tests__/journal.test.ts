import { writeFileSync } from 'node:fs'
import path from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { TransactionJournal, type JournalEntry } from '../src/journal.js'
import { createTempDirs } from './helpers.js'

const temp = createTempDirs()

afterEach(() => {
  temp.cleanup()
})

const entry: JournalEntry = {
  transactionId: 'tx-1',
  mutation: 'install-plugin stats@1.0.0',
  startedAt: '2026-03-01T12:00:00.000Z',
  stagedPath: '/srv/scoreboard/.hub/staging/a.json',
  createdDirs: ['/srv/scoreboard/plugins/stats/1.0.0'],
  transitions: [{ id: 'stats', from: null, to: 'disabled' }],
}

describe('TransactionJournal', () => {
  it('reads back what it wrote and forgets it on clear', async () => {
    const journal = new TransactionJournal(path.join(temp.make('hub-journal-'), 'pending.json'))

    expect(await journal.read()).toBeNull()
    expect(await journal.exists()).toBe(false)

    await journal.write(entry)
    expect(await journal.read()).toEqual(entry)
    expect(await journal.exists()).toBe(true)

    await journal.clear()
    expect(await journal.read()).toBeNull()
  })

  it('throws on a file that is not JSON', async () => {
    const file = path.join(temp.make('hub-journal-'), 'pending.json')
    writeFileSync(file, '{')

    await expect(new TransactionJournal(file).read()).rejects.toThrow(
      `Pending-transaction journal ${file} is not valid JSON`
    )
  })

  it('throws on JSON that is not an entry', async () => {
    const file = path.join(temp.make('hub-journal-'), 'pending.json')
    writeFileSync(file, '{"transactionId": 3}')

    await expect(new TransactionJournal(file).read()).rejects.toThrow(
      `Pending-transaction journal ${file} is not a journal entry`
    )
  })
})
