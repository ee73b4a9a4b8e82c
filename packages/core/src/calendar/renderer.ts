/**
 * Calendar Renderer
 *
 * Pure projection of the reservation list onto one iCalendar (RFC 5545)
 * document. Output is byte-identical for the same input apart from DTSTAMP.
 */

import { createHash } from 'node:crypto'
import type { DateTime } from 'luxon'
import { BookingError } from '../errors.js'
import { addNights, toICalDate } from '../reservations/dates.js'
import { normalizeName, storeProblems } from '../reservations/validation.js'
import type { Reservation } from '../reservations/types.js'

export const PRODID = '-//Cabin Calendar//Reservations//EN'
export const UID_DOMAIN = 'cabin-calendar'

const MAX_LINE_OCTETS = 75
const CRLF = '\r\n'

export interface RenderOptions {
  /** Written as DTSTAMP on every event */
  stamp: DateTime
  /** Display name for subscribing clients (X-WR-CALNAME) */
  calendarName?: string
}

/** The renderer's view of one reservation */
export interface CalendarEvent {
  uid: string
  summary: string
  description: string
  location: string
  /** Inclusive first night, `YYYY-MM-DD` */
  start: string
  /** Exclusive end (check-out day), `YYYY-MM-DD` */
  end: string
}

export function eventUid(guestName: string, checkInDate: string): string {
  const digest = createHash('sha1').update(`${normalizeName(guestName)}|${checkInDate}`).digest('hex')
  return `${digest}@${UID_DOMAIN}`
}

export function toCalendarEvent(r: Reservation): CalendarEvent {
  const lines = [
    `Guest: ${r.guestName}`,
    `Cabin: ${r.cabin}`,
    `Nights: ${r.totalNights}`,
    `Total: ${r.totalPrice}`,
    `Deposit: ${r.deposit}`,
    `Balance: ${r.totalPrice - r.deposit}`,
  ]
  if (r.phone.trim()) lines.push(`Phone: ${r.phone}`)
  if (r.notes.trim()) lines.push(`Notes: ${r.notes}`)

  return {
    uid: eventUid(r.guestName, r.checkInDate),
    summary: `${r.guestName} - ${r.cabin}`,
    description: lines.join('\n'),
    location: r.cabin,
    start: r.checkInDate,
    end: addNights(r.checkInDate, r.totalNights),
  }
}

/** TEXT value escaping: backslash, semicolon, comma and line breaks */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

/**
 * Fold a content line at 75 octets. Continuation lines start with a single
 * space, which counts towards their 75. Code points are never split.
 */
export function foldLine(line: string): string[] {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) return [line]

  const out: string[] = []
  let current = ''
  let octets = 0
  let limit = MAX_LINE_OCTETS
  for (const ch of line) {
    const size = Buffer.byteLength(ch, 'utf-8')
    if (octets + size > limit) {
      out.push(out.length === 0 ? current : ` ${current}`)
      current = ''
      octets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += ch
    octets += size
  }
  out.push(out.length === 0 ? current : ` ${current}`)
  return out
}

function formatStamp(stamp: DateTime): string {
  return stamp.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")
}

export function renderCalendar(reservations: readonly Reservation[], options: RenderOptions): string {
  const problems = storeProblems(reservations)
  if (problems.length > 0) {
    throw new BookingError('RenderInvariant', `Refusing to render an inconsistent store: ${problems.join('; ')}`, {
      problems,
    })
  }

  const dtstamp = formatStamp(options.stamp)
  const lines: string[] = ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${PRODID}`, 'CALSCALE:GREGORIAN', 'METHOD:PUBLISH']
  if (options.calendarName) {
    lines.push(`X-WR-CALNAME:${escapeText(options.calendarName)}`)
  }

  for (const event of reservations.map(toCalendarEvent)) {
    lines.push(
      'BEGIN:VEVENT',
      `UID:${event.uid}`,
      `DTSTAMP:${dtstamp}`,
      `DTSTART;VALUE=DATE:${toICalDate(event.start)}`,
      `DTEND;VALUE=DATE:${toICalDate(event.end)}`,
      `SUMMARY:${escapeText(event.summary)}`,
      `DESCRIPTION:${escapeText(event.description)}`,
      `LOCATION:${escapeText(event.location)}`,
      'STATUS:CONFIRMED',
      'TRANSP:OPAQUE',
      'END:VEVENT',
    )
  }

  lines.push('END:VCALENDAR')
  return lines.flatMap(foldLine).join(CRLF) + CRLF
}

function withoutStamps(artifact: string): string {
  return artifact
    .split(/\r?\n/)
    .filter((line) => !line.startsWith('DTSTAMP:'))
    .join('\n')
}

/** True when two artifacts differ at most in their DTSTAMP lines */
export function sameArtifact(a: string, b: string): boolean {
  return withoutStamps(a) === withoutStamps(b)
}

/** Number of VEVENT blocks in an artifact */
export function countEvents(artifact: string): number {
  return artifact.split(/\r?\n/).filter((line) => line === 'BEGIN:VEVENT').length
}
