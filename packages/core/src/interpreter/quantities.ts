/**
 * Relative dates and spoken quantities
 *
 * The model is asked to resolve dates itself, but operators often say
 * "next friday" or "two weeks" and the model sometimes echoes the phrase.
 * These helpers resolve what is left against the clock.
 */

import { DateTime } from 'luxon'
import { isValidIsoDate, toIsoDate } from '../reservations/dates.js'

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  single: 1,
  two: 2,
  couple: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20,
  thirty: 30,
}

const WEEKDAYS: Record<string, number> = {
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
  sunday: 7,
  sun: 7,
}

const MONTH_DAY_FORMATS = ['MMMM d', 'MMM d', 'd MMMM', 'd MMM']
const MONTH_DAY_YEAR_FORMATS = ['MMMM d yyyy', 'MMM d yyyy', 'd MMMM yyyy', 'd MMM yyyy']

function parseCount(text: string): number | null {
  if (/^\d+$/.test(text)) return Number(text)
  let parts = text.split(/[\s-]+/).filter((p) => p !== 'of' && p !== 'and')
  // "a couple": the article is not a count of its own
  if (parts.length > 1) parts = parts.filter((p) => p !== 'a' && p !== 'an')
  if (parts.length === 0) return null
  let total = 0
  for (const part of parts) {
    const value = NUMBER_WORDS[part]
    if (value === undefined) return null
    total += value
  }
  return total
}

/**
 * Parse a stay length or count: `4`, `"three"`, `"twenty-one nights"`,
 * `"a week"`, `"two weeks"`, `"a fortnight"`. Returns null when unrecognized
 * or not a positive whole number.
 */
export function parseQuantity(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : null
  }

  const text = value
    .trim()
    .toLowerCase()
    .replace(/\s+(nights?|days?)$/, '')
    .trim()
  if (!text) return null

  if (/^(a|one)?\s*fortnight$/.test(text)) return 14

  const weeks = text.match(/^(.+?)\s+weeks?$/) ?? (text === 'week' ? ['week', 'a'] : null)
  if (weeks) {
    const count = parseCount(weeks[1])
    return count && count > 0 ? count * 7 : null
  }

  const count = parseCount(text)
  return count && count > 0 ? count : null
}

/** Next date strictly after `today` that falls on `weekday` (1 = Monday) */
function upcomingWeekday(today: DateTime, weekday: number): DateTime {
  const delta = (weekday - today.weekday + 7) % 7 || 7
  return today.plus({ days: delta })
}

function parseMonthDay(text: string, today: DateTime): DateTime | null {
  const cleaned = text.replace(/(\d)(st|nd|rd|th)\b/g, '$1').replace(/,/g, ' ').replace(/\s+/g, ' ').trim()
  for (const format of MONTH_DAY_YEAR_FORMATS) {
    const dt = DateTime.fromFormat(cleaned, format, { locale: 'en' })
    if (dt.isValid) return dt
  }
  for (const format of MONTH_DAY_FORMATS) {
    const dt = DateTime.fromFormat(cleaned, format, { locale: 'en' }).set({ year: today.year })
    if (dt.isValid) return dt < today.startOf('day') ? dt.plus({ years: 1 }) : dt
  }
  return null
}

/**
 * Resolve a date phrase to `YYYY-MM-DD` against `today`: ISO dates,
 * `today`, `tomorrow`, `day after tomorrow`, weekday names (with or without
 * `next`/`this`, always the upcoming one after today), `in N days`,
 * `in N weeks`, and month-day forms such as `October 3`.
 */
export function resolveDate(phrase: string, today: DateTime): string | null {
  const base = today.startOf('day')
  const text = phrase
    .trim()
    .toLowerCase()
    .replace(/^(on|the)\s+/, '')
    .trim()

  if (isValidIsoDate(text)) return text

  if (text === 'today' || text === 'tonight') return toIsoDate(base)
  if (text === 'tomorrow') return toIsoDate(base.plus({ days: 1 }))
  if (/^(the )?day after tomorrow$/.test(text)) return toIsoDate(base.plus({ days: 2 }))

  const inDays = text.match(/^in\s+(.+?)\s+(days?|weeks?)$/)
  if (inDays) {
    const count = parseCount(inDays[1])
    if (count === null) return null
    return toIsoDate(base.plus({ days: inDays[2].startsWith('week') ? count * 7 : count }))
  }

  const weekday = text.match(/^(?:(?:next|this|coming)\s+)?([a-z]+)$/)
  if (weekday) {
    const day = WEEKDAYS[weekday[1]]
    if (day !== undefined) return toIsoDate(upcomingWeekday(base, day))
  }

  const monthDay = parseMonthDay(text, base)
  return monthDay ? toIsoDate(monthDay) : null
}

/** Parse a money amount such as `2000`, `"1,500.50"` or `"$900"` */
export function parseAmount(value: string | number): number | null {
  if (typeof value === 'number') return Number.isFinite(value) && value >= 0 ? value : null
  const cleaned = value.trim().replace(/^[^\d.-]+/, '').replace(/,(?=\d{3}\b)/g, '')
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null
  return Number(cleaned)
}
