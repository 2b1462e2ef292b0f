export * from './controller.js'
export * from './coordinator.js'
export * from './health.js'
export * from './plan.js'
export * from './state-machine.js'
export * from './target.js'
