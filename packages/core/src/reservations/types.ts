/**
 * Reservation Types
 *
 * A reservation is keyed by guest name (case-insensitive). Dates are local
 * wall dates in ISO `YYYY-MM-DD` form; the check-out date is always derived.
 */

export interface Reservation {
  guestName: string
  /** ISO date of the first occupied night */
  checkInDate: string
  /** Occupied nights, at least 1 */
  totalNights: number
  totalPrice: number
  cabin: string
  /** Amount already paid, never above totalPrice */
  deposit: number
  phone: string
  notes: string
}

/** Input for a new reservation: optional fields fall back to their defaults */
export type ReservationDraft = Omit<Reservation, 'deposit' | 'phone' | 'notes'> &
  Partial<Pick<Reservation, 'deposit' | 'phone' | 'notes'>>

/** Fields present replace the stored value; omitted fields are kept */
export type ReservationPatch = Partial<Reservation>

/** Result of a modification: the record before and after the patch */
export interface ModifiedReservation {
  before: Reservation
  after: Reservation
}
