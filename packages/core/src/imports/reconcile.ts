/**
 * Reconcile bookings from external calendar feeds with the store.
 *
 * Pure: takes the current records and the blocks currently in the feeds,
 * returns the next record list and a report of what happened.
 */

import type { DateTime } from 'luxon'
import { addNights, daysBetween } from '../reservations/dates.js'
import { findCabinConflict, sameCabin, sameGuest } from '../reservations/validation.js'
import type { Reservation } from '../reservations/types.js'

export const IMPORT_NOTE_PREFIX = 'Imported from'

const MIN_NIGHTS = 2
const MAX_NIGHTS = 31
const MAX_MONTHS_AHEAD = 7

/** Summaries feeds use for blocks that carry no guest name */
const PLACEHOLDER_SUMMARIES = new Set([
  'airbnb booking',
  'airbnb (not available)',
  'not available',
  'reserved',
  'blocked',
  'unavailable',
])

/** One occupied range read from a feed */
export interface FeedBlock {
  /** Inclusive first night, `YYYY-MM-DD` */
  start: string
  /** Exclusive end, `YYYY-MM-DD` */
  end: string
  summary: string
  cabin: string
  /** Feed name, recorded in the imported record's notes */
  source: string
}

export type ImportSkipReason = 'no_guest_name' | 'too_short' | 'too_long' | 'too_far_ahead' | 'duplicate_guest'

export interface ImportSkip {
  block: FeedBlock
  reason: ImportSkipReason
}

export interface ImportConflict {
  block: FeedBlock
  existing: Reservation
}

export interface ImportReport {
  added: Reservation[]
  removed: Reservation[]
  skipped: ImportSkip[]
  conflicts: ImportConflict[]
}

export interface ReconcileResult {
  reservations: Reservation[]
  report: ImportReport
  changed: boolean
}

export function isImported(r: Reservation): boolean {
  return r.notes.startsWith(IMPORT_NOTE_PREFIX)
}

function sameRange(r: Reservation, block: FeedBlock): boolean {
  return (
    r.checkInDate === block.start &&
    addNights(r.checkInDate, r.totalNights) === block.end &&
    sameCabin(r.cabin, block.cabin)
  )
}

export function reconcileImports(
  existing: readonly Reservation[],
  blocks: readonly FeedBlock[],
  today: DateTime,
): ReconcileResult {
  const todayIso = today.toFormat('yyyy-MM-dd')
  const cutoff = today.plus({ months: MAX_MONTHS_AHEAD }).toFormat('yyyy-MM-dd')
  const report: ImportReport = { added: [], removed: [], skipped: [], conflicts: [] }

  // Imported stays that vanished from the feeds are cancellations, unless the
  // guest already left: feeds drop past stays on their own.
  const kept: Reservation[] = []
  for (const r of existing) {
    const checkOut = addNights(r.checkInDate, r.totalNights)
    if (isImported(r) && checkOut >= todayIso && !blocks.some((b) => sameRange(r, b))) {
      report.removed.push(r)
    } else {
      kept.push(r)
    }
  }

  for (const block of blocks) {
    if (kept.some((r) => isImported(r) && sameRange(r, block))) continue

    const summary = block.summary.trim()
    if (!summary || PLACEHOLDER_SUMMARIES.has(summary.toLowerCase())) {
      report.skipped.push({ block, reason: 'no_guest_name' })
      continue
    }

    const nights = daysBetween(block.start, block.end)
    if (nights < MIN_NIGHTS) {
      report.skipped.push({ block, reason: 'too_short' })
      continue
    }
    if (nights > MAX_NIGHTS) {
      report.skipped.push({ block, reason: 'too_long' })
      continue
    }
    if (block.start > cutoff) {
      report.skipped.push({ block, reason: 'too_far_ahead' })
      continue
    }

    const candidate: Reservation = {
      guestName: summary,
      checkInDate: block.start,
      totalNights: nights,
      totalPrice: 0,
      cabin: block.cabin,
      deposit: 0,
      phone: '',
      notes: `${IMPORT_NOTE_PREFIX} ${block.source} - ${summary}`,
    }

    if (kept.some((r) => sameGuest(r.guestName, summary))) {
      report.skipped.push({ block, reason: 'duplicate_guest' })
      continue
    }
    const conflict = findCabinConflict(kept, candidate)
    if (conflict) {
      report.conflicts.push({ block, existing: conflict })
      continue
    }

    kept.push(candidate)
    report.added.push(candidate)
  }

  return {
    reservations: kept,
    report,
    changed: report.added.length > 0 || report.removed.length > 0,
  }
}
