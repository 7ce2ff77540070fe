export * from './model/candidate'
export * from './model/config'
export * from './model/errors'
export * from './model/verdict'
export { safeReadConfig } from './data/config'
export { ServiceRegistry } from './services/serviceRegistry'
export type { ServiceOverrides } from './services/serviceRegistry'
export { LogService } from './services/logService'
export type { LogLevel } from './services/logService'
export { InMemoryLockService } from './services/lockService'
export type { LockService } from './services/lockService'
export * from './services/scoringService'
export * from './services/candidateService'
export * from './services/matchingService'
export * from './services/sourceService'
export * from './services/clientService'
export * from './services/batchService'
export * from './services/reportService'
export { runBatch } from './operations/runBatch'
export { matchPerson } from './operations/matchPerson'
export { compareNames as checkNames } from './operations/compareNames'
export type { NameCheck } from './operations/compareNames'
