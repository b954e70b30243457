export * from './catalog.js'
export * from './catalog-index.js'
export * from './layout.js'
export * from './manifest.js'
export * from './package-source.js'
export * from './planner.js'
export * from './registry.js'
export * from './types.js'
