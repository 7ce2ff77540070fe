export * from './scoringService'
export * from './similarity'
export * from './nameMatching'
export * from './stringComparison'
export * from './types'
