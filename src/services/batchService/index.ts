export * from './batchService'
export * from './helpers'
export * from './personCases'
