export * from './entities.js'
export * from './validation.js'
