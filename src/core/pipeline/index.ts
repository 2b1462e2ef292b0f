export * from './gitops.js'
export * from './pipeline.js'
export * from './select.js'
