export * from './sourceService'
export * from './fileCandidateSource'
export * from './session'
export * from './validation'
export * from './helpers'
export * from './types'
