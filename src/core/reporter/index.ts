export * from './base.js'
export * from './json.js'
export * from './markdown.js'
export * from './sink.js'
export * from './vulnerability.js'
