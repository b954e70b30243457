import { readFileSync, writeFileSync } from 'node:fs'
import path from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { TransactionLock } from '../src/lock.js'
import { createTempDirs, FIXED_NOW, quietLogger } from './helpers.js'

const temp = createTempDirs()

afterEach(() => {
  temp.cleanup()
})

function createLock(isAlive: (pid: number) => boolean = () => false, pid = 1234) {
  const lockFile = path.join(temp.make('hub-lock-'), '.hub', 'hub.lock')
  const lock = new TransactionLock(lockFile, {
    pid,
    isAlive,
    now: () => FIXED_NOW,
    logger: quietLogger,
  })
  return { lock, lockFile }
}

describe('TransactionLock', () => {
  it('writes the holder and removes the file on release', async () => {
    const { lock, lockFile } = createLock()

    expect(await lock.tryAcquire('tx-1')).toEqual({ success: true })
    expect(lock.isHeld).toBe(true)
    expect(JSON.parse(readFileSync(lockFile, 'utf8'))).toEqual({
      pid: 1234,
      transactionId: 'tx-1',
      acquiredAt: FIXED_NOW.toISOString(),
    })

    await lock.release()
    expect(lock.isHeld).toBe(false)
    expect(await lock.inspect()).toBe('missing')
  })

  it('refuses a second holder in the same process', async () => {
    const { lock } = createLock()
    await lock.tryAcquire('tx-1')

    expect(await lock.tryAcquire('tx-2')).toEqual({
      success: false,
      holder: { pid: 1234, transactionId: 'tx-1', acquiredAt: FIXED_NOW.toISOString() },
    })
  })

  it('refuses concurrent attempts that start before either finishes', async () => {
    const { lock } = createLock()

    const [first, second] = await Promise.all([lock.tryAcquire('tx-1'), lock.tryAcquire('tx-2')])

    expect(first).toEqual({ success: true })
    expect(second).toEqual({ success: false, holder: null })
  })

  it('treats a live holder from another process as busy', async () => {
    const { lock: other, lockFile } = createLock(() => true, 999)
    await other.tryAcquire('tx-other')
    const lock = new TransactionLock(lockFile, { pid: 1234, isAlive: () => true, logger: quietLogger })

    const attempt = await lock.tryAcquire('tx-1')

    expect(attempt).toEqual({
      success: false,
      holder: { pid: 999, transactionId: 'tx-other', acquiredAt: FIXED_NOW.toISOString() },
    })
  })

  it('takes over a lock whose holder is gone', async () => {
    const { lock, lockFile } = createLock(() => false)
    await new TransactionLock(lockFile, { pid: 999, logger: quietLogger }).tryAcquire('tx-dead')

    expect(await lock.tryAcquire('tx-1')).toEqual({ success: true })
    expect(await lock.inspect()).toEqual({
      pid: 1234,
      transactionId: 'tx-1',
      acquiredAt: FIXED_NOW.toISOString(),
    })
  })

  it('treats an unreadable lock file as busy', async () => {
    const { lock, lockFile } = createLock()
    await lock.tryAcquire('tx-1')
    await lock.release()
    writeFileSync(lockFile, 'garbage')

    expect(await lock.tryAcquire('tx-2')).toEqual({ success: false, holder: null })
    expect(await lock.inspect()).toBe('corrupt')
  })

  it('leaves a lock file that another transaction has taken over', async () => {
    const { lock, lockFile } = createLock()
    await lock.tryAcquire('tx-1')
    writeFileSync(
      lockFile,
      JSON.stringify({ pid: 77, transactionId: 'tx-new', acquiredAt: FIXED_NOW.toISOString() })
    )

    await lock.release()

    expect(await lock.inspect()).toMatchObject({ transactionId: 'tx-new' })
  })
})
