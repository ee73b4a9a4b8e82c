export { OperationCoordinator, publicationWarnings } from './coordinator.js'
export type { OperationCoordinatorOptions } from './coordinator.js'
export { AsyncLock } from './lock.js'
export type { LockOptions } from './lock.js'
export type { OperationResult, ImportResult } from './types.js'
