/**
 * Reservation invariants shared by the store, the coordinator and the renderer.
 */

import { BookingError } from '../errors.js'
import { addNights, isValidIsoDate, stayEnd, stayRangesOverlap } from './dates.js'
import type { Reservation, ReservationDraft } from './types.js'

export function normalizeName(name: string): string {
  return name.trim().toLowerCase()
}

export function sameGuest(a: string, b: string): boolean {
  return normalizeName(a) === normalizeName(b)
}

export function sameCabin(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase()
}

/** Apply defaults for the optional fields and trim the text fields */
export function completeDraft(draft: ReservationDraft): Reservation {
  return {
    guestName: draft.guestName.trim(),
    checkInDate: draft.checkInDate.trim(),
    totalNights: draft.totalNights,
    totalPrice: draft.totalPrice,
    cabin: draft.cabin.trim(),
    deposit: draft.deposit ?? 0,
    phone: (draft.phone ?? '').trim(),
    notes: (draft.notes ?? '').trim(),
  }
}

/** Field-level problems of a single record; empty when the record is valid */
export function fieldProblems(r: Reservation): string[] {
  const problems: string[] = []
  if (!r.guestName.trim()) problems.push('guest name is empty')
  if (!isValidIsoDate(r.checkInDate)) problems.push(`check-in date "${r.checkInDate}" is not a valid YYYY-MM-DD date`)
  if (!Number.isInteger(r.totalNights) || r.totalNights < 1) {
    problems.push(`total nights must be a whole number of at least 1 (got ${r.totalNights})`)
  } else if (isValidIsoDate(r.checkInDate) && stayEnd(r.checkInDate, r.totalNights) === null) {
    problems.push(`a stay of ${r.totalNights} nights from ${r.checkInDate} ends past the last representable date`)
  }
  if (!Number.isFinite(r.totalPrice) || r.totalPrice < 0) {
    problems.push(`total price must be zero or more (got ${r.totalPrice})`)
  }
  if (!Number.isFinite(r.deposit) || r.deposit < 0) {
    problems.push(`deposit must be zero or more (got ${r.deposit})`)
  } else if (r.deposit > r.totalPrice) {
    problems.push(`deposit ${r.deposit} is above the total price ${r.totalPrice}`)
  }
  if (!r.cabin.trim()) problems.push('cabin is empty')
  return problems
}

export function assertValidFields(r: Reservation): void {
  const problems = fieldProblems(r)
  if (problems.length > 0) {
    throw new BookingError('InvalidReservation', `Invalid reservation for ${r.guestName || '(no name)'}: ${problems.join('; ')}`, {
      problems,
    })
  }
}

export function findGuestIndex(list: readonly Reservation[], guestName: string): number {
  return list.findIndex((r) => sameGuest(r.guestName, guestName))
}

/** First record in `others` sharing the cabin with an overlapping stay */
export function findCabinConflict(
  others: readonly Reservation[],
  candidate: Reservation,
): Reservation | undefined {
  return others.find(
    (r) =>
      sameCabin(r.cabin, candidate.cabin) &&
      stayRangesOverlap(r.checkInDate, r.totalNights, candidate.checkInDate, candidate.totalNights),
  )
}

/**
 * Check that `candidate` can live next to `others`: valid fields, unique guest,
 * no overlapping stay in the same cabin.
 */
export function assertPlaceable(others: readonly Reservation[], candidate: Reservation): void {
  assertValidFields(candidate)

  const duplicate = others.find((r) => sameGuest(r.guestName, candidate.guestName))
  if (duplicate) {
    throw new BookingError('DuplicateGuest', `A reservation for ${duplicate.guestName} already exists`, {
      guestName: duplicate.guestName,
    })
  }

  const conflict = findCabinConflict(others, candidate)
  if (conflict) {
    throw new BookingError(
      'CabinConflict',
      `${candidate.cabin} is already booked by ${conflict.guestName} from ${conflict.checkInDate} to ${addNights(conflict.checkInDate, conflict.totalNights)}`,
      {
        cabin: conflict.cabin,
        guestName: conflict.guestName,
        checkInDate: conflict.checkInDate,
        checkOutDate: addNights(conflict.checkInDate, conflict.totalNights),
      },
    )
  }
}

/**
 * Problems with a whole record set, as pairs of guest names.
 * Used by the renderer, which must never publish an inconsistent calendar.
 */
export function storeProblems(list: readonly Reservation[]): string[] {
  const problems: string[] = []
  const datesValid = list.map(
    (r) => isValidIsoDate(r.checkInDate) && Number.isInteger(r.totalNights) && stayEnd(r.checkInDate, r.totalNights) !== null,
  )
  list.forEach((r, i) => {
    for (const p of fieldProblems(r)) problems.push(`${r.guestName || `row ${i + 1}`}: ${p}`)
    list.slice(i + 1).forEach((other, offset) => {
      if (sameGuest(r.guestName, other.guestName)) {
        problems.push(`duplicate guest ${r.guestName}`)
      } else if (
        datesValid[i] &&
        datesValid[i + 1 + offset] &&
        sameCabin(r.cabin, other.cabin) &&
        stayRangesOverlap(r.checkInDate, r.totalNights, other.checkInDate, other.totalNights)
      ) {
        problems.push(`${r.guestName} and ${other.guestName} overlap in ${r.cabin}`)
      }
    })
  })
  return problems
}
