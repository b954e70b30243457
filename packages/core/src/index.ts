export * from './context.js'
export * from './errors.js'
export * from './journal.js'
export * from './lock.js'
export * from './mutation.js'
export * from './orchestrator.js'
export * from './runtime-view.js'
export * from './transaction.js'
export * from './transaction-id.js'
