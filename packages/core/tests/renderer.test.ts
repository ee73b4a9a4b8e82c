import { describe, it, expect } from 'vitest'
import { createHash } from 'node:crypto'
import { DateTime } from 'luxon'
import {
  countEvents,
  escapeText,
  foldLine,
  renderCalendar,
  sameArtifact,
} from '../src/calendar/renderer.js'
import { reservation, thrownBy } from './helpers/fixtures.js'

const STAMP = DateTime.fromISO('2025-10-01T12:00:00Z')

function unfold(ics: string): string[] {
  return ics.replace(/\r\n /g, '').split('\r\n')
}

describe('renderCalendar', () => {
  it('renders an all-day event with an exclusive end date', () => {
    const lines = unfold(renderCalendar([reservation()], { stamp: STAMP }))
    const uid = createHash('sha1').update('ana torres|2025-10-03').digest('hex')

    expect(lines).toEqual([
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//Cabin Calendar//Reservations//EN',
      'CALSCALE:GREGORIAN',
      'METHOD:PUBLISH',
      'BEGIN:VEVENT',
      `UID:${uid}@cabin-calendar`,
      'DTSTAMP:20251001T120000Z',
      'DTSTART;VALUE=DATE:20251003',
      'DTEND;VALUE=DATE:20251007',
      'SUMMARY:Ana Torres - Colibri',
      String.raw`DESCRIPTION:Guest: Ana Torres\nCabin: Colibri\nNights: 4\nTotal: 2000\nDeposit: 500\nBalance: 1500`,
      'LOCATION:Colibri',
      'STATUS:CONFIRMED',
      'TRANSP:OPAQUE',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ])
  })

  it('renders an empty store as a calendar with no events', () => {
    const ics = renderCalendar([], { stamp: STAMP })
    expect(ics).toBe(
      'BEGIN:VCALENDAR\r\nVERSION:2.0\r\nPRODID:-//Cabin Calendar//Reservations//EN\r\nCALSCALE:GREGORIAN\r\nMETHOD:PUBLISH\r\nEND:VCALENDAR\r\n',
    )
    expect(countEvents(ics)).toBe(0)
  })

  it('adds phone and notes to the description and escapes them', () => {
    const lines = unfold(
      renderCalendar([reservation({ phone: '555-0100', notes: 'Late; bring, towels\nand \\ tea' })], { stamp: STAMP }),
    )
    expect(lines).toContain(
      String.raw`DESCRIPTION:Guest: Ana Torres\nCabin: Colibri\nNights: 4\nTotal: 2000\nDeposit: 500\nBalance: 1500\nPhone: 555-0100\nNotes: Late\; bring\, towels\nand \\ tea`,
    )
  })

  it('escapes the guest name and cabin in SUMMARY and LOCATION', () => {
    const lines = unfold(renderCalendar([reservation({ guestName: 'Paz, Luis', cabin: 'Roble;Alto' })], { stamp: STAMP }))
    expect(lines).toContain(String.raw`SUMMARY:Paz\, Luis - Roble\;Alto`)
    expect(lines).toContain(String.raw`LOCATION:Roble\;Alto`)
  })

  it('names the calendar when asked', () => {
    const lines = unfold(renderCalendar([], { stamp: STAMP, calendarName: 'Cabins, North' }))
    expect(lines).toContain(String.raw`X-WR-CALNAME:Cabins\, North`)
  })

  it('emits CRLF line endings folded at 75 octets', () => {
    const ics = renderCalendar(
      [reservation({ notes: 'Ñandú watching trip with the whole family, arriving late by bus from the coast' })],
      { stamp: STAMP },
    )
    expect(ics.endsWith('END:VCALENDAR\r\n')).toBe(true)
    expect(ics.replace(/\r\n/g, '')).not.toContain('\n')
    for (const line of ics.split('\r\n')) {
      expect(Buffer.byteLength(line, 'utf-8')).toBeLessThanOrEqual(75)
    }
  })

  it('emits one event per reservation in store order', () => {
    const ics = renderCalendar(
      [reservation(), reservation({ guestName: 'Luis Paz', checkInDate: '2025-09-01', cabin: 'Roble' })],
      { stamp: STAMP },
    )
    expect(countEvents(ics)).toBe(2)
    expect(unfold(ics).filter((l) => l.startsWith('SUMMARY:'))).toEqual([
      'SUMMARY:Ana Torres - Colibri',
      'SUMMARY:Luis Paz - Roble',
    ])
  })

  it('is identical for the same store apart from DTSTAMP', () => {
    const list = [reservation(), reservation({ guestName: 'Luis Paz', cabin: 'Roble' })]
    const a = renderCalendar(list, { stamp: STAMP })
    const b = renderCalendar(list, { stamp: STAMP.plus({ seconds: 1 }) })

    expect(a).not.toBe(b)
    expect(sameArtifact(a, b)).toBe(true)
    expect(renderCalendar(list, { stamp: STAMP })).toBe(a)
    expect(sameArtifact(a, renderCalendar([reservation()], { stamp: STAMP }))).toBe(false)
  })

  it('keeps the UID stable across case changes of the guest name', () => {
    const uidOf = (name: string) =>
      unfold(renderCalendar([reservation({ guestName: name })], { stamp: STAMP })).find((l) => l.startsWith('UID:'))
    expect(uidOf('ANA TORRES')).toBe(uidOf('Ana Torres'))
  })

  it('refuses a store that breaks its invariants', () => {
    const overlapping = [reservation(), reservation({ guestName: 'Luis Paz', checkInDate: '2025-10-05' })]
    expect(thrownBy(() => renderCalendar(overlapping, { stamp: STAMP }))).toMatchObject({ kind: 'RenderInvariant' })

    const duplicated = [reservation(), reservation({ guestName: 'ana torres', cabin: 'Roble' })]
    expect(thrownBy(() => renderCalendar(duplicated, { stamp: STAMP }))).toMatchObject({ kind: 'RenderInvariant' })

    expect(thrownBy(() => renderCalendar([reservation({ totalNights: 0 })], { stamp: STAMP }))).toMatchObject({
      kind: 'RenderInvariant',
    })
  })

  it('refuses a stay whose check-out date cannot be written', () => {
    expect(thrownBy(() => renderCalendar([reservation({ totalNights: 200_000_000 })], { stamp: STAMP }))).toMatchObject({
      kind: 'RenderInvariant',
      message:
        'Refusing to render an inconsistent store: Ana Torres: a stay of 200000000 nights from 2025-10-03 ends past the last representable date',
    })
  })
})

describe('foldLine', () => {
  it('leaves short lines alone', () => {
    expect(foldLine('SUMMARY:short')).toEqual(['SUMMARY:short'])
    expect(foldLine('x'.repeat(75))).toEqual(['x'.repeat(75)])
  })

  it('folds ASCII at 75 octets with a leading space on continuations', () => {
    expect(foldLine('a'.repeat(100))).toEqual(['a'.repeat(75), ` ${'a'.repeat(25)}`])
    expect(foldLine('b'.repeat(160))).toEqual(['b'.repeat(75), ` ${'b'.repeat(74)}`, ` ${'b'.repeat(11)}`])
  })

  it('never splits a multi-byte character', () => {
    expect(foldLine('é'.repeat(50))).toEqual(['é'.repeat(37), ` ${'é'.repeat(13)}`])

    const emoji = `x${'😀'.repeat(20)}`
    const folded = foldLine(emoji)
    expect(folded).toEqual([`x${'😀'.repeat(18)}`, ` ${'😀'.repeat(2)}`])
    expect(folded.map((l, i) => (i === 0 ? l : l.slice(1))).join('')).toBe(emoji)
  })
})

describe('escapeText', () => {
  it('escapes backslash, semicolon, comma and newlines', () => {
    expect(escapeText('a\\b;c,d\ne\r\nf')).toBe('a\\\\b\\;c\\,d\\ne\\nf')
  })
})
