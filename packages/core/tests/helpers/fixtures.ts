import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { Reservation } from '../../src/reservations/types.js'

export function createTempDir(prefix = 'cabin-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function cleanDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

export function reservation(overrides: Partial<Reservation> = {}): Reservation {
  return {
    guestName: 'Ana Torres',
    checkInDate: '2025-10-03',
    totalNights: 4,
    totalPrice: 2000,
    cabin: 'Colibri',
    deposit: 500,
    phone: '',
    notes: '',
    ...overrides,
  }
}

/** The value `fn` throws; fails the test when it returns normally */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected the call to throw')
}
