import { DateTime } from 'luxon'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

/** True for a real Gregorian date written as `YYYY-MM-DD` */
export function isValidIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && DateTime.fromISO(value).isValid
}

export function toIsoDate(dt: DateTime): string {
  const iso = dt.toISODate()
  if (iso === null) {
    throw new Error(`Invalid date: ${dt.invalidExplanation ?? 'unknown'}`)
  }
  return iso
}

/** Date `nights` days after `isoDate` (the exclusive end of a stay) */
export function addNights(isoDate: string, nights: number): string {
  return toIsoDate(DateTime.fromISO(isoDate).plus({ days: nights }))
}

/** Exclusive end of a stay, or null when it falls outside the `YYYY-MM-DD` range */
export function stayEnd(isoDate: string, nights: number): string | null {
  const end = DateTime.fromISO(isoDate).plus({ days: nights })
  const iso = end.isValid ? end.toISODate() : null
  return iso !== null && isValidIsoDate(iso) ? iso : null
}

/** Compact `yyyyMMdd` form used by iCalendar DATE values */
export function toICalDate(isoDate: string): string {
  return isoDate.replace(/-/g, '')
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: string, to: string): number {
  return Math.round(DateTime.fromISO(to).diff(DateTime.fromISO(from), 'days').days)
}

/**
 * Half-open interval overlap: [aStart, aEnd) and [bStart, bEnd).
 * Stays that only touch at a boundary (check-out day = check-in day) do not overlap.
 */
export function stayRangesOverlap(
  aStart: string,
  aNights: number,
  bStart: string,
  bNights: number,
): boolean {
  const aEnd = addNights(aStart, aNights)
  const bEnd = addNights(bStart, bNights)
  return aStart < bEnd && bStart < aEnd
}
