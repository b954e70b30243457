export * from './format.js'
export * from './options.js'
