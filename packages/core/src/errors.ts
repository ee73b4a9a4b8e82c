/**
 * Booking Errors
 *
 * Every failure the pipeline reports to an operator carries one of these kinds.
 * Validation kinds never crash the process; configuration kinds are fatal at startup.
 */

export type BookingErrorKind =
  | 'StoreCorrupt'
  | 'DuplicateGuest'
  | 'NotFound'
  | 'CabinConflict'
  | 'InvalidReservation'
  | 'TranscriptionFailed'
  | 'InterpretAmbiguous'
  | 'RenderInvariant'
  | 'PublishUnconfigured'
  | 'PublishFailed'
  | 'Timeout'

export class BookingError extends Error {
  readonly kind: BookingErrorKind
  readonly details?: Record<string, unknown>

  constructor(kind: BookingErrorKind, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'BookingError'
    this.kind = kind
    this.details = details
  }
}

export function isBookingError(err: unknown, kind?: BookingErrorKind): err is BookingError {
  return err instanceof BookingError && (kind === undefined || err.kind === kind)
}

/** Message text for logging any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
