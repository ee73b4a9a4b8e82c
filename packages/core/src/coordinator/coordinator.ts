/**
 * Operation Coordinator
 *
 * The only mutation entry point. Each operation runs under the process-wide
 * lock: fresh load and validation → store write → render → publish.
 * A failed publication never reverts the store; the next successful one
 * carries the accumulated state.
 */

import { systemClock, type Clock } from '../clock.js'
import { renderCalendar } from '../calendar/renderer.js'
import { BookingError, errorMessage, isBookingError } from '../errors.js'
import { createLogger } from '../logger.js'
import { reconcileImports, type FeedBlock, type ImportReport, type ReconcileResult } from '../imports/reconcile.js'
import type { MutationIntent } from '../interpreter/types.js'
import type { PublicationOutcome, PublishOperation, Publisher } from '../publish/types.js'
import { backupStore } from '../reservations/backup.js'
import type { BookingStore } from '../reservations/store.js'
import type { Reservation, ReservationDraft, ReservationPatch } from '../reservations/types.js'
import { completeDraft } from '../reservations/validation.js'
import { AsyncLock } from './lock.js'
import type { ImportResult, OperationResult } from './types.js'

const log = createLogger('coordinator')

const DEFAULT_LOCK_TIMEOUT_MS = 30_000

export interface OperationCoordinatorOptions {
  store: BookingStore
  publisher: Publisher
  lock?: AsyncLock
  clock?: Clock
  /** Configured cabin labels; empty accepts any non-empty label */
  cabins?: readonly string[]
  lockTimeoutMs?: number
  /** X-WR-CALNAME of the published calendar */
  calendarName?: string
}

interface Mutation {
  guestName: string
  reservation?: Reservation
  previous?: Reservation
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/** Operator-facing warnings for a publication that did not reach the remote */
export function publicationWarnings(outcome: PublicationOutcome): string[] {
  switch (outcome.state) {
    case 'failed':
      return [
        `Saved, but the public calendar is behind (${outcome.stage} failed: ${outcome.cause}). It will catch up on the next successful publication.`,
        ...outcome.warnings,
      ]
    case 'unconfigured':
      return [`Saved, but publishing is not set up: ${outcome.reason}`, ...outcome.warnings]
    default:
      return outcome.warnings
  }
}

export class OperationCoordinator {
  private readonly store: BookingStore
  private readonly publisher: Publisher
  private readonly lock: AsyncLock
  private readonly clock: Clock
  private readonly cabins: readonly string[]
  private readonly lockTimeoutMs: number
  private readonly calendarName: string | undefined

  constructor(options: OperationCoordinatorOptions) {
    this.store = options.store
    this.publisher = options.publisher
    this.lock = options.lock ?? new AsyncLock()
    this.clock = options.clock ?? systemClock
    this.cabins = options.cabins ?? []
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS
    this.calendarName = options.calendarName
  }

  /** Current records; readers never take the lock */
  list(): Promise<Reservation[]> {
    return this.store.load()
  }

  create(draft: ReservationDraft): Promise<OperationResult> {
    return this.run('create', async () => {
      const candidate = completeDraft(draft)
      candidate.cabin = this.normalizeCabin(candidate.cabin)
      const reservation = await this.store.append(candidate)
      return { guestName: reservation.guestName, reservation }
    })
  }

  modify(guestName: string, patch: ReservationPatch): Promise<OperationResult> {
    return this.run('modify', async () => {
      const normalized: ReservationPatch =
        patch.cabin === undefined ? patch : { ...patch, cabin: this.normalizeCabin(patch.cabin) }
      const { before, after } = await this.store.modify(guestName, normalized)
      return { guestName: after.guestName, reservation: after, previous: before }
    })
  }

  delete(guestName: string): Promise<OperationResult> {
    return this.run('delete', async () => {
      const removed = await this.store.delete(guestName)
      return { guestName: removed.guestName, reservation: removed }
    })
  }

  /** Dispatch a mutation intent from the interpreter */
  apply(intent: MutationIntent): Promise<OperationResult> {
    switch (intent.kind) {
      case 'create':
        return this.create(intent.draft)
      case 'modify':
        return this.modify(intent.guestName, intent.patch)
      case 'delete':
        return this.delete(intent.guestName)
    }
  }

  /** Re-render the full store and push anything pending */
  sync(): Promise<OperationResult> {
    return this.run('sync', async () => ({ guestName: 'all reservations' }))
  }

  /** Merge bookings read from external feeds into the store */
  async importFeeds(blocks: FeedBlock[]): Promise<ImportResult> {
    const emptyReport: ImportReport = { added: [], removed: [], skipped: [], conflicts: [] }
    try {
      return await this.lock.runExclusive(
        async () => {
          const warnings: string[] = []
          const now = this.clock()
          try {
            await backupStore(this.store.filePath, now)
          } catch (err) {
            warnings.push(`Store backup failed: ${errorMessage(err)}`)
            log.warn({ err: errorMessage(err) }, 'Store backup failed')
          }

          let result: ReconcileResult
          try {
            const existing = await this.store.load()
            result = reconcileImports(
              existing,
              blocks.map((b) => ({ ...b, cabin: this.knownCabin(b.cabin) ?? b.cabin })),
              now,
            )
            if (result.changed) await this.store.save(result.reservations)
          } catch (err) {
            log.error({ err: errorMessage(err) }, 'Import failed')
            return {
              storeOk: false,
              operation: 'import' as const,
              publication: null,
              warnings,
              error: toError(err),
              report: emptyReport,
            }
          }

          const { report } = result
          for (const conflict of report.conflicts) {
            warnings.push(
              `Feed ${conflict.block.source}: ${conflict.block.summary} (${conflict.block.start} to ${conflict.block.end}) overlaps ${conflict.existing.guestName} in ${conflict.existing.cabin}`,
            )
          }
          log.info(
            {
              added: report.added.length,
              removed: report.removed.length,
              skipped: report.skipped.length,
              conflicts: report.conflicts.length,
            },
            'Feeds reconciled',
          )

          if (!result.changed) {
            return { storeOk: true, operation: 'import' as const, publication: null, warnings, report }
          }
          const summary = `${report.added.length} added, ${report.removed.length} removed`
          const publication = await this.renderAndPublish('import', summary, warnings)
          return { storeOk: true, operation: 'import' as const, publication, warnings, report }
        },
        { timeoutMs: this.lockTimeoutMs },
      )
    } catch (err) {
      if (isBookingError(err, 'Timeout')) {
        return { storeOk: false, operation: 'import', publication: null, warnings: [], error: err, report: emptyReport }
      }
      throw err
    }
  }

  // -------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------

  private async run(operation: PublishOperation, mutate: () => Promise<Mutation>): Promise<OperationResult> {
    try {
      return await this.lock.runExclusive(
        async () => {
          let mutation: Mutation
          try {
            mutation = await mutate()
          } catch (err) {
            if (!isBookingError(err)) log.error({ operation, err: errorMessage(err) }, 'Store operation failed')
            return { storeOk: false, operation, publication: null, warnings: [], error: toError(err) }
          }

          const warnings: string[] = []
          const publication = await this.renderAndPublish(operation, mutation.guestName, warnings)
          const result: OperationResult = { storeOk: true, operation, publication, warnings }
          if (mutation.reservation) result.reservation = mutation.reservation
          if (mutation.previous) result.previous = mutation.previous
          return result
        },
        { timeoutMs: this.lockTimeoutMs },
      )
    } catch (err) {
      if (isBookingError(err, 'Timeout')) {
        log.warn({ operation }, 'Lock wait timed out')
        return { storeOk: false, operation, publication: null, warnings: [], error: err }
      }
      throw err
    }
  }

  /** Render the whole store and publish it; problems become warnings */
  private async renderAndPublish(
    operation: PublishOperation,
    guestName: string,
    warnings: string[],
  ): Promise<PublicationOutcome | null> {
    const at = this.clock()

    let artifact: string
    try {
      const list = await this.store.load()
      artifact = renderCalendar(list, { stamp: at, calendarName: this.calendarName })
    } catch (err) {
      if (isBookingError(err, 'RenderInvariant')) {
        log.error({ err: err.message, operation }, 'Internal consistency bug: store violates its invariants')
      } else {
        log.error({ err: errorMessage(err), operation }, 'Render failed')
      }
      warnings.push(`Saved, but the calendar could not be rendered: ${errorMessage(err)}`)
      return null
    }

    let outcome: PublicationOutcome
    try {
      outcome = await this.publisher.publish(artifact, { operation, guestName, at })
    } catch (err) {
      log.error({ err: errorMessage(err), operation }, 'Publisher error')
      outcome = { state: 'failed', stage: 'stage', cause: errorMessage(err), queued: true, pending: 0, warnings: [] }
    }
    warnings.push(...publicationWarnings(outcome))
    return outcome
  }

  private knownCabin(label: string): string | undefined {
    const wanted = label.trim().toLowerCase()
    return this.cabins.find((c) => c.trim().toLowerCase() === wanted)
  }

  private normalizeCabin(label: string): string {
    if (this.cabins.length === 0) return label.trim()
    const known = this.knownCabin(label)
    if (!known) {
      throw new BookingError('InvalidReservation', `Unknown cabin "${label}". Known cabins: ${this.cabins.join(', ')}`, {
        cabin: label,
        cabins: [...this.cabins],
      })
    }
    return known
  }
}
