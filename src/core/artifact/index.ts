export * from './backend.js'
export * from './builder.js'
export * from './registry.js'
