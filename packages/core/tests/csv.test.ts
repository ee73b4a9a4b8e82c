import { describe, it, expect } from 'vitest'
import { CSV_HEADER, parseReservationsCsv, serializeReservationsCsv } from '../src/reservations/csv.js'
import { reservation, thrownBy } from './helpers/fixtures.js'

describe('serializeReservationsCsv', () => {
  it('writes the header and one row per reservation', () => {
    const text = serializeReservationsCsv([reservation()])
    expect(text).toBe(`${CSV_HEADER}\nAna Torres,2025-10-03,2000,4,Colibri,500,,\n`)
  })

  it('writes an empty store as the header alone', () => {
    expect(serializeReservationsCsv([])).toBe(
      'guest_name,check_in_date,total_price,total_nights,cabin,deposit,phone,notes\n',
    )
  })

  it('quotes fields containing commas, quotes and line breaks', () => {
    const text = serializeReservationsCsv([
      reservation({ guestName: 'Paz, Luis', notes: 'Late arrival, "VIP"\nbring towels', totalPrice: 1500.5 }),
    ])
    expect(text.split('\n').slice(1).join('\n')).toBe(
      '"Paz, Luis",2025-10-03,1500.5,4,Colibri,500,,"Late arrival, ""VIP""\nbring towels"\n',
    )
  })
})

describe('parseReservationsCsv', () => {
  it('round-trips values that need quoting', () => {
    const list = [
      reservation(),
      reservation({
        guestName: 'Paz, Luis',
        checkInDate: '2025-11-01',
        cabin: 'Roble',
        totalPrice: 1234.75,
        deposit: 0,
        phone: '+56 9 1234 5678',
        notes: 'Says "hi"\r\nsecond line; third, part',
      }),
      reservation({ guestName: 'Élodie Brun', cabin: 'Colibri', checkInDate: '2025-12-20', notes: 'café ☕' }),
    ]
    expect(parseReservationsCsv(serializeReservationsCsv(list))).toEqual(list)
  })

  it('treats an empty file as an empty store', () => {
    expect(parseReservationsCsv('')).toEqual([])
    expect(parseReservationsCsv(`${CSV_HEADER}\n`)).toEqual([])
  })

  it('reads an empty deposit cell as 0', () => {
    const [r] = parseReservationsCsv(`${CSV_HEADER}\nAna Torres,2025-10-03,2000,4,Colibri,,,\n`)
    expect(r.deposit).toBe(0)
  })

  it('accepts CRLF line endings and a byte order mark', () => {
    const list = parseReservationsCsv(`\uFEFF${CSV_HEADER}\r\nAna Torres,2025-10-03,2000,4,Colibri,500,,\r\n`)
    expect(list).toEqual([reservation()])
  })

  it('rejects a header that does not match the schema', () => {
    const err = thrownBy(() => parseReservationsCsv('name,date\nAna,2025-10-03\n'))
    expect(err).toMatchObject({ kind: 'StoreCorrupt' })
    expect(err).toHaveProperty('message', expect.stringContaining('Line 1: header "name,date"'))
  })

  it('names the line of an unparseable row', () => {
    const text = `${CSV_HEADER}\nAna Torres,2025-10-03,2000,4,Colibri,500,,\nLuis Paz,2025-10-09,abc,2,Colibri,0,,\n`
    expect(() => parseReservationsCsv(text)).toThrow('Line 3: total_price "abc" is not a number')
  })

  it('counts lines inside quoted fields when naming a bad row', () => {
    const text = `${CSV_HEADER}\nAna Torres,2025-10-03,2000,4,Colibri,500,,"one\ntwo"\nLuis Paz,2025-02-30,900,2,Colibri,0,,\n`
    expect(() => parseReservationsCsv(text)).toThrow('Line 4: check_in_date "2025-02-30" is not a valid date')
  })

  it('rejects rows that break the reservation rules', () => {
    const err = thrownBy(() => parseReservationsCsv(`${CSV_HEADER}\nAna Torres,2025-10-03,100,0,Colibri,500,,\n`))
    expect(err).toMatchObject({
      kind: 'StoreCorrupt',
      message: 'Line 2: total nights must be a whole number of at least 1 (got 0); deposit 500 is above the total price 100',
    })
    expect(() => parseReservationsCsv(`${CSV_HEADER}\nAna Torres,2025-10-03,-5,2,Colibri,0,,\n`)).toThrow(
      'Line 2: total price must be zero or more (got -5)',
    )
    expect(() => parseReservationsCsv(`${CSV_HEADER}\nAna Torres,2025-10-03,2000,200000000,Colibri,0,,\n`)).toThrow(
      'Line 2: a stay of 200000000 nights from 2025-10-03 ends past the last representable date',
    )
  })

  it('rejects duplicate guests and overlapping stays, naming the later line', () => {
    const first = 'Ana Torres,2025-10-03,2000,4,Colibri,500,,'
    const duplicate = thrownBy(() => parseReservationsCsv(`${CSV_HEADER}\n${first}\nana torres,2025-11-01,900,2,Roble,0,,\n`))
    expect(duplicate).toMatchObject({ kind: 'StoreCorrupt', message: 'Line 3: duplicate guest ana torres (first on line 2)' })

    const overlap = thrownBy(() => parseReservationsCsv(`${CSV_HEADER}\n${first}\nLuis Paz,2025-10-05,900,2,colibri,0,,\n`))
    expect(overlap).toMatchObject({ kind: 'StoreCorrupt', message: 'Line 3: Luis Paz overlaps Ana Torres (line 2) in Colibri' })
  })

  it('rejects rows with the wrong number of fields', () => {
    expect(() => parseReservationsCsv(`${CSV_HEADER}\nAna Torres,2025-10-03,2000\n`)).toThrow(
      'Line 2: expected 8 fields, found 3',
    )
  })

  it('rejects an unterminated quote', () => {
    const err = thrownBy(() => parseReservationsCsv(`${CSV_HEADER}\n"Ana Torres,2025-10-03,2000,4,Colibri,500,,\n`))
    expect(err).toMatchObject({ kind: 'StoreCorrupt', message: 'Unterminated quoted field starting on line 2' })
  })
})
