import { describe, it, expect, vi, afterEach } from 'vitest'
import { DateTime } from 'luxon'
import { fetchFeed, parseFeed, type FeedSource } from '../src/imports/feed.js'
import { reconcileImports, type FeedBlock } from '../src/imports/reconcile.js'
import { FeedSyncScheduler } from '../src/imports/scheduler.js'
import type { Reservation } from '../src/reservations/types.js'
import { reservation } from './helpers/fixtures.js'

const TODAY = DateTime.fromISO('2025-10-01T08:00:00', { zone: 'utc' })

function block(overrides: Partial<FeedBlock> = {}): FeedBlock {
  return {
    start: '2025-10-10',
    end: '2025-10-13',
    summary: 'Carla Gómez',
    cabin: 'Roble',
    source: 'airbnb',
    ...overrides,
  }
}

function imported(overrides: Partial<Reservation> = {}): Reservation {
  const guestName = overrides.guestName ?? 'Carla Gómez'
  return reservation({
    guestName,
    checkInDate: '2025-10-10',
    totalNights: 3,
    totalPrice: 0,
    deposit: 0,
    cabin: 'Roble',
    notes: `Imported from airbnb - ${guestName}`,
    ...overrides,
  })
}

// ---------------------------------------------------------------------------
// reconcileImports
// ---------------------------------------------------------------------------

describe('reconcileImports', () => {
  it('adds a named block as a zero-price reservation', () => {
    const result = reconcileImports([reservation()], [block()], TODAY)

    expect(result.changed).toBe(true)
    expect(result.reservations).toEqual([reservation(), imported()])
    expect(result.report.added).toEqual([imported()])
  })

  it('skips blocks that cannot become reservations', () => {
    const blocks = [
      block({ summary: 'Reserved' }),
      block({ summary: 'Airbnb (Not available)' }),
      block({ summary: '  ' }),
      block({ summary: 'One Night', end: '2025-10-11' }),
      block({ summary: 'Long Stay', end: '2025-11-20' }),
      block({ summary: 'Far Ahead', start: '2026-06-01', end: '2026-06-04' }),
      block({ summary: 'ana torres', cabin: 'Pino' }),
    ]
    const result = reconcileImports([reservation()], blocks, TODAY)

    expect(result.report.skipped.map((s) => `${s.block.summary.trim() || '(blank)'}: ${s.reason}`)).toEqual([
      'Reserved: no_guest_name',
      'Airbnb (Not available): no_guest_name',
      '(blank): no_guest_name',
      'One Night: too_short',
      'Long Stay: too_long',
      'Far Ahead: too_far_ahead',
      'ana torres: duplicate_guest',
    ])
    expect(result.changed).toBe(false)
    expect(result.reservations).toEqual([reservation()])
  })

  it('reports a block that overlaps an existing stay in the same cabin', () => {
    const clash = block({ summary: 'Pedro Luna', start: '2025-10-05', end: '2025-10-08', cabin: 'colibri' })
    const result = reconcileImports([reservation()], [clash], TODAY)

    expect(result.report.conflicts).toEqual([{ block: clash, existing: reservation() }])
    expect(result.changed).toBe(false)
  })

  it('keeps an imported stay that is still in the feed', () => {
    const result = reconcileImports([imported()], [block()], TODAY)

    expect(result.changed).toBe(false)
    expect(result.reservations).toEqual([imported()])
    expect(result.report).toEqual({ added: [], removed: [], skipped: [], conflicts: [] })
  })

  it('removes upcoming imported stays that left the feed, but not past ones or manual ones', () => {
    const past = imported({ guestName: 'Past Guest', checkInDate: '2025-09-01' })
    const gone = imported({ guestName: 'Gone Guest', checkInDate: '2025-10-20' })
    const manual = reservation({ cabin: 'Roble', checkInDate: '2025-11-01' })

    const result = reconcileImports([past, gone, manual], [], TODAY)

    expect(result.report.removed).toEqual([gone])
    expect(result.reservations).toEqual([past, manual])
    expect(result.changed).toBe(true)
  })

  it('treats a moved block as a removal plus an addition', () => {
    const moved = block({ start: '2025-10-11', end: '2025-10-14' })
    const result = reconcileImports([imported()], [moved], TODAY)

    expect(result.report.removed).toEqual([imported()])
    expect(result.report.added).toEqual([imported({ checkInDate: '2025-10-11' })])
    expect(result.reservations).toEqual([imported({ checkInDate: '2025-10-11' })])
  })
})

// ---------------------------------------------------------------------------
// Feeds
// ---------------------------------------------------------------------------

const SOURCE: FeedSource = { name: 'airbnb', url: 'https://feeds.example.test/roble.ics', cabin: 'Roble' }

const FEED = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Example//Feed//EN',
  'BEGIN:VEVENT',
  'UID:one@example.test',
  'DTSTAMP:20250901T000000Z',
  'DTSTART;VALUE=DATE:20251010',
  'DTEND;VALUE=DATE:20251013',
  'SUMMARY:Carla Gómez',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:two@example.test',
  'DTSTAMP:20250901T000000Z',
  'DTSTART;VALUE=DATE:20270301',
  'DTEND;VALUE=DATE:20270305',
  'SUMMARY:Reserved',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n')

describe('parseFeed', () => {
  it('reads all-day events as blocks for the source cabin', () => {
    expect(parseFeed(FEED, SOURCE)).toEqual([
      block(),
      block({ start: '2027-03-01', end: '2027-03-05', summary: 'Reserved' }),
    ])
  })

  it('reads timed events by their calendar date and keeps untitled ones blank', () => {
    const ics = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//Example//Feed//EN',
      'BEGIN:VEVENT',
      'UID:three@example.test',
      'DTSTAMP:20250901T000000Z',
      'DTSTART:20251020T150000Z',
      'DTEND:20251023T110000Z',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ].join('\r\n')

    expect(parseFeed(ics, SOURCE)).toEqual([block({ start: '2025-10-20', end: '2025-10-23', summary: '' })])
  })

  it('limits events to a window', () => {
    const window = { from: TODAY.minus({ months: 1 }), to: TODAY.plus({ years: 1 }) }
    expect(parseFeed(FEED, SOURCE, window)).toEqual([block()])
  })
})

describe('fetchFeed', () => {
  it('returns the body of a successful response', async () => {
    const fetchImpl = vi.fn(async () => new Response(FEED, { status: 200 }))
    expect(await fetchFeed(SOURCE.url, { fetchImpl })).toBe(FEED)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('throws on an HTTP error', async () => {
    const fetchImpl = vi.fn(async () => new Response('gone', { status: 404, statusText: 'Not Found' }))
    await expect(fetchFeed(SOURCE.url, { fetchImpl })).rejects.toThrow('Feed request failed: 404 Not Found')
  })
})

// ---------------------------------------------------------------------------
// FeedSyncScheduler
// ---------------------------------------------------------------------------

describe('FeedSyncScheduler', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  const second: FeedSource = { name: 'booking', url: 'https://feeds.example.test/pino.ics', cabin: 'Pino' }

  it('imports the blocks of every feed in one round', async () => {
    const importer = { importFeeds: vi.fn(async () => undefined) }
    const scheduler = new FeedSyncScheduler({
      sources: [SOURCE, second],
      importer,
      clock: () => TODAY,
      fetch: async () => FEED,
    })

    expect(await scheduler.runOnce()).toEqual({ ok: true, blocks: 2, failures: [] })
    expect(importer.importFeeds).toHaveBeenCalledWith([block(), block({ cabin: 'Pino', source: 'booking' })])
  })

  it('skips the whole round when a feed cannot be read', async () => {
    const importer = { importFeeds: vi.fn(async () => undefined) }
    const scheduler = new FeedSyncScheduler({
      sources: [SOURCE, second],
      importer,
      clock: () => TODAY,
      fetch: async (url) => {
        if (url === second.url) throw new Error('Feed request failed: 503 Service Unavailable')
        return FEED
      },
    })

    expect(await scheduler.runOnce()).toEqual({
      ok: false,
      blocks: 1,
      failures: [{ source: 'booking', error: 'Feed request failed: 503 Service Unavailable' }],
    })
    expect(importer.importFeeds).not.toHaveBeenCalled()
  })

  it('shares a round already in progress', async () => {
    let calls = 0
    const importer = { importFeeds: vi.fn(async () => undefined) }
    const scheduler = new FeedSyncScheduler({
      sources: [SOURCE],
      importer,
      clock: () => TODAY,
      fetch: async () => {
        calls += 1
        return FEED
      },
    })

    const [a, b] = await Promise.all([scheduler.runOnce(), scheduler.runOnce()])
    expect(a).toBe(b)
    expect(calls).toBe(1)
  })

  it('syncs on start and on every interval until stopped', async () => {
    vi.useFakeTimers()
    const importer = { importFeeds: vi.fn(async () => undefined) }
    const scheduler = new FeedSyncScheduler({
      sources: [SOURCE],
      importer,
      intervalMs: 60_000,
      clock: () => TODAY,
      fetch: async () => FEED,
    })

    scheduler.start()
    expect(scheduler.running).toBe(true)
    // joins the round start() kicked off
    await scheduler.runOnce()
    expect(importer.importFeeds).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(60_000)
    await scheduler.stop()
    expect(importer.importFeeds).toHaveBeenCalledTimes(2)
    expect(scheduler.running).toBe(false)
    await vi.advanceTimersByTimeAsync(120_000)
    expect(importer.importFeeds).toHaveBeenCalledTimes(2)
  })

  it('stays idle without feeds', () => {
    const scheduler = new FeedSyncScheduler({ sources: [], importer: { importFeeds: vi.fn(async () => undefined) } })
    scheduler.start()
    expect(scheduler.running).toBe(false)
  })
})
