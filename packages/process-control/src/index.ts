export * from './errors.js'
export * from './health.js'
export * from './supervisor.js'
export * from './timeout.js'
export * from './transport.js'
export * from './types.js'
