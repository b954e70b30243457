import { describe, expect, it, vi } from 'vitest'

import { Transaction } from '../src/transaction.js'

describe('Transaction', () => {
  it('records each state it passes through', () => {
    const listener = vi.fn()
    const tx = new Transaction('tx-1', 'set-config', listener)

    tx.transition('validated')
    tx.transition('applying')
    tx.transition('verifying')
    tx.transition('committed')

    expect(tx.history).toEqual(['open', 'validated', 'applying', 'verifying', 'committed'])
    expect(tx.terminal).toBe(true)
    expect(listener).toHaveBeenCalledTimes(4)
    expect(listener).toHaveBeenLastCalledWith(tx, 'verifying', 'committed')
  })

  it('commits an unchanged transaction straight from validated', () => {
    const tx = new Transaction('tx-1', 'disable-plugin')
    tx.transition('validated')
    tx.transition('committed')

    expect(tx.state).toBe('committed')
  })

  it.each([
    ['open', 'committed'],
    ['open', 'applying'],
    ['validated', 'verifying'],
  ] as const)('refuses %s -> %s', (from, to) => {
    const tx = new Transaction('tx-1', 'set-config')
    if (from === 'validated') tx.transition('validated')

    expect(() => tx.transition(to)).toThrow(`Transaction tx-1 cannot move from ${from} to ${to}`)
    expect(tx.state).toBe(from)
  })

  it('does not leave a terminal state', () => {
    const tx = new Transaction('tx-1', 'set-config')
    tx.transition('rolled-back')

    expect(tx.terminal).toBe(true)
    expect(() => tx.transition('validated')).toThrow(
      'Transaction tx-1 cannot move from rolled-back to validated'
    )
  })

  it('hands out a copy of its history', () => {
    const tx = new Transaction('tx-1', 'set-config')
    tx.history.push('committed')

    expect(tx.history).toEqual(['open'])
  })
})
