export * from './finding.js'
export * from './change.js'
export * from './artifact.js'
export * from './scan.js'
export * from './rollout.js'
export * from './report.js'
