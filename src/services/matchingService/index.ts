export * from './ranker'
export * from './verdictEngine'
