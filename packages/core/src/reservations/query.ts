import type { DateTime } from 'luxon'
import { addNights } from './dates.js'
import type { Reservation } from './types.js'

/** Stays not yet checked out on `today`, soonest first */
export function upcomingReservations(list: readonly Reservation[], today: DateTime): Reservation[] {
  const todayIso = today.toFormat('yyyy-MM-dd')
  return list
    .filter((r) => addNights(r.checkInDate, r.totalNights) > todayIso)
    .sort((a, b) => a.checkInDate.localeCompare(b.checkInDate) || a.cabin.localeCompare(b.cabin))
}
