/**
 * Feed Sync Scheduler
 *
 * Polls the configured external feeds and hands their bookings to the
 * coordinator. A round where any feed fails is skipped entirely, so a
 * temporarily unreachable feed never reads as a wave of cancellations.
 */

import { systemClock, type Clock } from '../clock.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import { fetchFeed, parseFeed, type FeedSource } from './feed.js'
import type { FeedBlock } from './reconcile.js'

const log = createLogger('feed-sync')

/** The part of the coordinator the scheduler drives */
export interface FeedImporter {
  importFeeds(blocks: FeedBlock[]): Promise<unknown>
}

export interface FeedSyncSchedulerConfig {
  sources: readonly FeedSource[]
  importer: FeedImporter
  intervalMs?: number
  clock?: Clock
  fetch?: (url: string) => Promise<string>
}

export interface FeedSyncRound {
  ok: boolean
  blocks: number
  failures: { source: string; error: string }[]
}

export class FeedSyncScheduler {
  private readonly sources: readonly FeedSource[]
  private readonly importer: FeedImporter
  private readonly intervalMs: number
  private readonly clock: Clock
  private readonly fetchText: (url: string) => Promise<string>
  private interval: ReturnType<typeof setInterval> | null = null
  private inFlight: Promise<FeedSyncRound> | null = null

  constructor(config: FeedSyncSchedulerConfig) {
    this.sources = config.sources
    this.importer = config.importer
    this.intervalMs = config.intervalMs ?? 60 * 60_000
    this.clock = config.clock ?? systemClock
    this.fetchText = config.fetch ?? ((url) => fetchFeed(url))
  }

  get running(): boolean {
    return this.interval !== null
  }

  start(): void {
    if (this.interval) {
      log.warn('Already running')
      return
    }
    if (this.sources.length === 0) {
      log.info('No feeds configured, feed sync disabled')
      return
    }

    this.interval = setInterval(() => this.tick(), this.intervalMs)
    log.info({ feeds: this.sources.length, everyMinutes: this.intervalMs / 60_000 }, 'Feed sync started')

    // Also sync immediately on start
    this.tick()
  }

  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
    if (this.inFlight) await this.inFlight
    log.info('Feed sync stopped')
  }

  /** One sync round; concurrent calls share the round in progress */
  runOnce(): Promise<FeedSyncRound> {
    if (!this.inFlight) {
      this.inFlight = this.sync().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private tick(): void {
    this.runOnce().catch((err: unknown) => {
      log.error({ err: errorMessage(err) }, 'Feed sync round failed')
    })
  }

  private async sync(): Promise<FeedSyncRound> {
    const today = this.clock()
    const window = { from: today.minus({ months: 1 }), to: today.plus({ years: 1 }) }
    const blocks: FeedBlock[] = []
    const failures: FeedSyncRound['failures'] = []

    for (const source of this.sources) {
      try {
        const ics = await this.fetchText(source.url)
        blocks.push(...parseFeed(ics, source, window))
      } catch (err) {
        failures.push({ source: source.name, error: errorMessage(err) })
        log.warn({ source: source.name, err: errorMessage(err) }, 'Feed unavailable')
      }
    }

    if (failures.length > 0) {
      log.warn({ failed: failures.length }, 'Skipping import round, not every feed could be read')
      return { ok: false, blocks: blocks.length, failures }
    }

    await this.importer.importFeeds(blocks)
    return { ok: true, blocks: blocks.length, failures }
  }
}
