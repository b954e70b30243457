export * from './atomic.js'
export * from './backups.js'
export * from './document.js'
export * from './errors.js'
export * from './schema.js'
export * from './store.js'
export * from './types.js'
export * from './validate.js'
