import type { ImportReport } from '../imports/reconcile.js'
import type { PublicationOutcome, PublishOperation } from '../publish/types.js'
import type { Reservation } from '../reservations/types.js'

export interface OperationResult {
  /** True when the store change (if any) is durable */
  storeOk: boolean
  operation: PublishOperation
  /** The created, modified or removed record */
  reservation?: Reservation
  /** The record before a modify */
  previous?: Reservation
  /** Null when publication did not run (store failure or render bug) */
  publication: PublicationOutcome | null
  warnings: string[]
  error?: Error
}

export interface ImportResult extends OperationResult {
  report: ImportReport
}
