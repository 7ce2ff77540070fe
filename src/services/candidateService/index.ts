export * from './candidateStore'
export * from './candidateRepository'
