import IcalExpander from 'ical-expander'
import type { DateTime } from 'luxon'
import type { FeedBlock } from './reconcile.js'

/** An external iCalendar feed whose bookings occupy one cabin */
export interface FeedSource {
  name: string
  url: string
  cabin: string
}

export interface FetchFeedOptions {
  timeoutMs?: number
  fetchImpl?: typeof fetch
}

export async function fetchFeed(url: string, options: FetchFeedOptions = {}): Promise<string> {
  const doFetch = options.fetchImpl ?? fetch
  const res = await doFetch(url, { signal: AbortSignal.timeout(options.timeoutMs ?? 30_000) })
  if (!res.ok) {
    throw new Error(`Feed request failed: ${res.status} ${res.statusText}`)
  }
  return res.text()
}

type Expansion = ReturnType<IcalExpander['between']>
type FeedEvent = Expansion['events'][number]
type FeedTime = FeedEvent['startDate']

/** Calendar date of a DATE or local DATE-TIME value, `YYYY-MM-DD` */
function dateOf(time: FeedTime): string {
  return time.toString().slice(0, 10)
}

/** ical.js returns null for an event without SUMMARY */
function summaryOf(event: FeedEvent): string {
  const summary: string | null = event.summary
  return summary ?? ''
}

/**
 * Occupied ranges in an iCalendar document, one per event or recurrence.
 * With a window, only events overlapping it are expanded.
 */
export function parseFeed(ics: string, source: FeedSource, window?: { from: DateTime; to: DateTime }): FeedBlock[] {
  const expander = new IcalExpander({ ics, maxIterations: 365 })
  const expanded = window ? expander.between(window.from.toJSDate(), window.to.toJSDate()) : expander.all()

  const blocks: FeedBlock[] = []
  for (const event of expanded.events) {
    blocks.push({
      start: dateOf(event.startDate),
      end: dateOf(event.endDate),
      summary: summaryOf(event),
      cabin: source.cabin,
      source: source.name,
    })
  }
  for (const occurrence of expanded.occurrences) {
    blocks.push({
      start: dateOf(occurrence.startDate),
      end: dateOf(occurrence.endDate),
      summary: summaryOf(occurrence.item),
      cabin: source.cabin,
      source: source.name,
    })
  }
  return blocks
}
