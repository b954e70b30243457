import type { MutationKind } from './mutation.js'

export type TransactionState =
  | 'open'
  | 'validated'
  | 'applying'
  | 'verifying'
  | 'committed'
  | 'rolled-back'

const ALLOWED: Record<TransactionState, readonly TransactionState[]> = {
  open: ['validated', 'rolled-back'],
  // An unchanged document commits straight from validated.
  validated: ['applying', 'committed', 'rolled-back'],
  applying: ['verifying', 'rolled-back'],
  verifying: ['committed', 'rolled-back'],
  committed: [],
  'rolled-back': [],
}

export type TransitionListener = (
  transaction: Transaction,
  from: TransactionState,
  to: TransactionState
) => void

export class Transaction {
  readonly id: string
  readonly kind: MutationKind
  private current: TransactionState = 'open'
  private readonly states: TransactionState[] = ['open']
  private readonly listener: TransitionListener | undefined

  constructor(id: string, kind: MutationKind, listener?: TransitionListener) {
    this.id = id
    this.kind = kind
    this.listener = listener
  }

  get state(): TransactionState {
    return this.current
  }

  get history(): TransactionState[] {
    return [...this.states]
  }

  get terminal(): boolean {
    return ALLOWED[this.current].length === 0
  }

  transition(to: TransactionState): void {
    const from = this.current
    if (!ALLOWED[from].includes(to)) {
      throw new Error(`Transaction ${this.id} cannot move from ${from} to ${to}`)
    }
    this.current = to
    this.states.push(to)
    this.listener?.(this, from, to)
  }
}
