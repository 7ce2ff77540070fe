export * from './reportService'
export * from './helpers'
