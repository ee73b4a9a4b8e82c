/**
 * Reservation CSV Codec
 *
 * Fixed column order, RFC 4180 quoting, `\n` row endings with a trailing
 * newline. Quoted fields may span lines.
 */

import { BookingError } from '../errors.js'
import { isValidIsoDate, stayRangesOverlap } from './dates.js'
import type { Reservation } from './types.js'
import { fieldProblems, sameCabin, sameGuest } from './validation.js'

export const CSV_COLUMNS = [
  'guest_name',
  'check_in_date',
  'total_price',
  'total_nights',
  'cabin',
  'deposit',
  'phone',
  'notes',
] as const

export const CSV_HEADER = CSV_COLUMNS.join(',')

interface CsvRow {
  /** 1-based line number where the row starts */
  line: number
  cells: string[]
}

/** Split CSV text into rows of raw cells */
export function parseCsvRows(text: string): CsvRow[] {
  const rows: CsvRow[] = []
  let cells: string[] = []
  let cell = ''
  let inQuotes = false
  let line = 1
  let rowStart = 1
  let i = 0

  const endRow = (): void => {
    cells.push(cell)
    rows.push({ line: rowStart, cells })
    cells = []
    cell = ''
  }

  while (i < text.length) {
    const ch = text[i]
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"'
          i += 2
          continue
        }
        inQuotes = false
      } else {
        if (ch === '\n') line++
        cell += ch
      }
      i++
      continue
    }

    if (ch === '"') {
      if (cell.length > 0) {
        throw new BookingError('StoreCorrupt', `Unexpected quote inside an unquoted field on line ${line}`, { line })
      }
      inQuotes = true
    } else if (ch === ',') {
      cells.push(cell)
      cell = ''
    } else if (ch === '\r' && text[i + 1] === '\n') {
      // CRLF row ending, handled by the \n on the next step
    } else if (ch === '\n') {
      endRow()
      line++
      rowStart = line
    } else {
      cell += ch
    }
    i++
  }

  if (inQuotes) {
    throw new BookingError('StoreCorrupt', `Unterminated quoted field starting on line ${rowStart}`, { line: rowStart })
  }
  if (cell.length > 0 || cells.length > 0) endRow()
  return rows
}

function quoteCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

function parseNumber(raw: string, column: string, line: number, fallback?: number): number {
  const trimmed = raw.trim()
  if (trimmed === '' && fallback !== undefined) return fallback
  const value = Number(trimmed)
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new BookingError('StoreCorrupt', `Line ${line}: ${column} "${raw}" is not a number`, { line, column })
  }
  return value
}

function rowToReservation(row: CsvRow): Reservation {
  const { line, cells } = row
  if (cells.length !== CSV_COLUMNS.length) {
    throw new BookingError(
      'StoreCorrupt',
      `Line ${line}: expected ${CSV_COLUMNS.length} fields, found ${cells.length}`,
      { line },
    )
  }
  const [guestName, checkInDate, totalPrice, totalNights, cabin, deposit, phone, notes] = cells
  if (!guestName.trim()) {
    throw new BookingError('StoreCorrupt', `Line ${line}: guest_name is empty`, { line, column: 'guest_name' })
  }
  if (!isValidIsoDate(checkInDate.trim())) {
    throw new BookingError('StoreCorrupt', `Line ${line}: check_in_date "${checkInDate}" is not a valid date`, {
      line,
      column: 'check_in_date',
    })
  }
  const nights = parseNumber(totalNights, 'total_nights', line)
  if (!Number.isInteger(nights)) {
    throw new BookingError('StoreCorrupt', `Line ${line}: total_nights "${totalNights}" is not a whole number`, {
      line,
      column: 'total_nights',
    })
  }

  const record: Reservation = {
    guestName: guestName.trim(),
    checkInDate: checkInDate.trim(),
    totalPrice: parseNumber(totalPrice, 'total_price', line),
    totalNights: nights,
    cabin: cabin.trim(),
    deposit: parseNumber(deposit, 'deposit', line, 0),
    phone,
    notes,
  }
  const problems = fieldProblems(record)
  if (problems.length > 0) {
    throw new BookingError('StoreCorrupt', `Line ${line}: ${problems.join('; ')}`, { line, problems })
  }
  return record
}

/** Duplicate guests and same-cabin overlaps, reported on the later line */
function assertConsistent(records: readonly { line: number; reservation: Reservation }[]): void {
  records.forEach((later, i) => {
    const r = later.reservation
    for (const earlier of records.slice(0, i)) {
      const other = earlier.reservation
      if (sameGuest(r.guestName, other.guestName)) {
        throw new BookingError(
          'StoreCorrupt',
          `Line ${later.line}: duplicate guest ${r.guestName} (first on line ${earlier.line})`,
          { line: later.line },
        )
      }
      if (
        sameCabin(r.cabin, other.cabin) &&
        stayRangesOverlap(r.checkInDate, r.totalNights, other.checkInDate, other.totalNights)
      ) {
        throw new BookingError(
          'StoreCorrupt',
          `Line ${later.line}: ${r.guestName} overlaps ${other.guestName} (line ${earlier.line}) in ${other.cabin}`,
          { line: later.line },
        )
      }
    }
  })
}

/**
 * Parse a whole store file. Throws `StoreCorrupt` naming the offending line,
 * for malformed rows and for records that break the reservation rules.
 */
export function parseReservationsCsv(text: string): Reservation[] {
  const content = text.startsWith('\uFEFF') ? text.slice(1) : text
  if (content.trim() === '') return []

  const [header, ...rows] = parseCsvRows(content)
  const headerText = header.cells.map((c) => c.trim()).join(',')
  if (headerText !== CSV_HEADER) {
    throw new BookingError('StoreCorrupt', `Line 1: header "${headerText}" does not match "${CSV_HEADER}"`, {
      line: 1,
    })
  }

  const records = rows
    .filter((row) => !(row.cells.length === 1 && row.cells[0].trim() === ''))
    .map((row) => ({ line: row.line, reservation: rowToReservation(row) }))
  assertConsistent(records)
  return records.map((record) => record.reservation)
}

export function serializeReservationsCsv(list: readonly Reservation[]): string {
  const lines = [CSV_HEADER]
  for (const r of list) {
    lines.push(
      [
        r.guestName,
        r.checkInDate,
        String(r.totalPrice),
        String(r.totalNights),
        r.cabin,
        String(r.deposit),
        r.phone,
        r.notes,
      ]
        .map(quoteCell)
        .join(','),
    )
  }
  return lines.join('\n') + '\n'
}
