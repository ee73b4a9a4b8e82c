import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { parseAmount, parseQuantity, resolveDate } from '../src/interpreter/quantities.js'
import { editDistance, nearestNames } from '../src/interpreter/candidates.js'

// Wednesday
const TODAY = DateTime.fromISO('2025-10-01T09:30:00')

describe('resolveDate', () => {
  it('passes ISO dates through', () => {
    expect(resolveDate('2025-12-24', TODAY)).toBe('2025-12-24')
    expect(resolveDate(' 2025-12-24 ', TODAY)).toBe('2025-12-24')
  })

  it('resolves day words', () => {
    expect(resolveDate('today', TODAY)).toBe('2025-10-01')
    expect(resolveDate('tonight', TODAY)).toBe('2025-10-01')
    expect(resolveDate('Tomorrow', TODAY)).toBe('2025-10-02')
    expect(resolveDate('the day after tomorrow', TODAY)).toBe('2025-10-03')
  })

  it('resolves offsets in days and weeks', () => {
    expect(resolveDate('in 3 days', TODAY)).toBe('2025-10-04')
    expect(resolveDate('in two weeks', TODAY)).toBe('2025-10-15')
    expect(resolveDate('in a week', TODAY)).toBe('2025-10-08')
    expect(resolveDate('in many days', TODAY)).toBeNull()
  })

  it('resolves weekdays to the next occurrence after today', () => {
    expect(resolveDate('friday', TODAY)).toBe('2025-10-03')
    expect(resolveDate('next Friday', TODAY)).toBe('2025-10-03')
    expect(resolveDate('on friday', TODAY)).toBe('2025-10-03')
    expect(resolveDate('thu', TODAY)).toBe('2025-10-02')
    expect(resolveDate('wednesday', TODAY)).toBe('2025-10-08')
    expect(resolveDate('this monday', TODAY)).toBe('2025-10-06')
  })

  it('resolves month-day forms, rolling past dates into next year', () => {
    expect(resolveDate('October 3', TODAY)).toBe('2025-10-03')
    expect(resolveDate('October 3rd', TODAY)).toBe('2025-10-03')
    expect(resolveDate('3 October', TODAY)).toBe('2025-10-03')
    expect(resolveDate('September 30', TODAY)).toBe('2026-09-30')
    expect(resolveDate('October 1', TODAY)).toBe('2025-10-01')
    expect(resolveDate('October 3, 2026', TODAY)).toBe('2026-10-03')
  })

  it('returns null for anything else', () => {
    expect(resolveDate('someday', TODAY)).toBeNull()
    expect(resolveDate('', TODAY)).toBeNull()
    expect(resolveDate('2025-02-30', TODAY)).toBeNull()
  })
})

describe('parseQuantity', () => {
  it('accepts positive whole numbers', () => {
    expect(parseQuantity(4)).toBe(4)
    expect(parseQuantity('12')).toBe(12)
    expect(parseQuantity(0)).toBeNull()
    expect(parseQuantity(2.5)).toBeNull()
    expect(parseQuantity('0')).toBeNull()
  })

  it('reads number words with a nights or days suffix', () => {
    expect(parseQuantity('three')).toBe(3)
    expect(parseQuantity('three nights')).toBe(3)
    expect(parseQuantity('twenty-one nights')).toBe(21)
    expect(parseQuantity('a couple of nights')).toBe(2)
    expect(parseQuantity('5 days')).toBe(5)
  })

  it('reads weeks and fortnights', () => {
    expect(parseQuantity('a week')).toBe(7)
    expect(parseQuantity('week')).toBe(7)
    expect(parseQuantity('two weeks')).toBe(14)
    expect(parseQuantity('3 weeks')).toBe(21)
    expect(parseQuantity('a fortnight')).toBe(14)
  })

  it('returns null for anything else', () => {
    expect(parseQuantity('many')).toBeNull()
    expect(parseQuantity('')).toBeNull()
    expect(parseQuantity('some weeks')).toBeNull()
  })
})

describe('parseAmount', () => {
  it('reads numbers, currency prefixes and thousands separators', () => {
    expect(parseAmount(2000)).toBe(2000)
    expect(parseAmount('$900')).toBe(900)
    expect(parseAmount('1,500.50')).toBe(1500.5)
    expect(parseAmount('0')).toBe(0)
  })

  it('rejects negatives and words', () => {
    expect(parseAmount(-5)).toBeNull()
    expect(parseAmount('-5')).toBeNull()
    expect(parseAmount('free')).toBeNull()
  })
})

describe('nearestNames', () => {
  it('computes edit distance', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3)
    expect(editDistance('', 'abc')).toBe(3)
    expect(editDistance('same', 'same')).toBe(0)
  })

  it('orders names by distance, ignoring case', () => {
    expect(nearestNames('ana', ['Luis', 'Ana', 'Anna'])).toEqual(['Ana', 'Anna', 'Luis'])
    expect(nearestNames('ANNA', ['Luis', 'Ana', 'Anna'], 1)).toEqual(['Anna'])
  })

  it('keeps input order on ties', () => {
    expect(nearestNames('x', ['ab', 'cd'])).toEqual(['ab', 'cd'])
  })
})
