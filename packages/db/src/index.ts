export * from './client.js'
export * from './contracts.js'
export * from './errors.js'
export * from './module.js'
export * from './repositories/index.js'
