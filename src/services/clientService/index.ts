export * from './faceClient'
export * from './helpers'
export * from './constants'
export * from './types'
