/**
 * Booking Store
 *
 * The authoritative reservation record: one CSV file, replaced atomically on
 * every write. The store does not lock; writers are serialized by the
 * coordinator.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import { randomBytes } from 'node:crypto'
import { BookingError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import { parseReservationsCsv, serializeReservationsCsv } from './csv.js'
import { assertPlaceable, findGuestIndex } from './validation.js'
import type { ModifiedReservation, Reservation, ReservationPatch } from './types.js'

const log = createLogger('store')

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/** Merge a patch: present fields replace, omitted fields are kept */
export function applyPatch(r: Reservation, patch: ReservationPatch): Reservation {
  return {
    guestName: patch.guestName?.trim() ?? r.guestName,
    checkInDate: patch.checkInDate?.trim() ?? r.checkInDate,
    totalNights: patch.totalNights ?? r.totalNights,
    totalPrice: patch.totalPrice ?? r.totalPrice,
    cabin: patch.cabin?.trim() ?? r.cabin,
    deposit: patch.deposit ?? r.deposit,
    phone: patch.phone?.trim() ?? r.phone,
    notes: patch.notes?.trim() ?? r.notes,
  }
}

export class BookingStore {
  constructor(readonly filePath: string) {}

  /** All reservations in file order. A missing file is an empty store. */
  async load(): Promise<Reservation[]> {
    let text: string
    try {
      text = await fs.readFile(this.filePath, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return []
      throw err
    }
    return parseReservationsCsv(text)
  }

  /** Replace the file contents: write a temporary sibling, fsync, rename. */
  async save(list: readonly Reservation[]): Promise<void> {
    const dir = path.dirname(this.filePath)
    const tmpPath = path.join(
      dir,
      `.${path.basename(this.filePath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`,
    )
    const text = serializeReservationsCsv(list)

    await fs.mkdir(dir, { recursive: true })
    const handle = await fs.open(tmpPath, 'w')
    try {
      try {
        await handle.writeFile(text, 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await fs.rename(tmpPath, this.filePath)
    } catch (err) {
      await fs.rm(tmpPath, { force: true })
      log.error({ err: errorMessage(err), path: this.filePath }, 'Store save failed')
      throw err
    }
    log.debug({ path: this.filePath, count: list.length }, 'Store saved')
  }

  async append(reservation: Reservation): Promise<Reservation> {
    const list = await this.load()
    assertPlaceable(list, reservation)
    list.push(reservation)
    await this.save(list)
    return reservation
  }

  async delete(guestName: string): Promise<Reservation> {
    const list = await this.load()
    const index = findGuestIndex(list, guestName)
    if (index === -1) {
      throw new BookingError('NotFound', `No reservation found for ${guestName}`, { guestName })
    }
    const [removed] = list.splice(index, 1)
    await this.save(list)
    return removed
  }

  async modify(guestName: string, patch: ReservationPatch): Promise<ModifiedReservation> {
    const list = await this.load()
    const index = findGuestIndex(list, guestName)
    if (index === -1) {
      throw new BookingError('NotFound', `No reservation found for ${guestName}`, { guestName })
    }
    const before = list[index]
    const after = applyPatch(before, patch)
    const others = list.filter((_, i) => i !== index)
    assertPlaceable(others, after)
    list[index] = after
    await this.save(list)
    return { before, after }
  }
}
