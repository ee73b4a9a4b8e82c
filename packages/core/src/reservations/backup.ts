import fs from 'node:fs/promises'
import path from 'node:path'
import { DateTime } from 'luxon'
import { createLogger } from '../logger.js'

const log = createLogger('store-backup')

const MARKER = '.last_backup_date'

/**
 * Copy the store into `<dir>/backup/<base>_<yyyyMMdd_HHmmss>.csv`, at most
 * once per calendar day. Returns the backup path, or null when nothing was
 * copied (already backed up today, or no store yet).
 */
export async function backupStore(storePath: string, now: DateTime): Promise<string | null> {
  const backupDir = path.join(path.dirname(storePath), 'backup')
  const markerPath = path.join(backupDir, MARKER)
  const today = now.toFormat('yyyy-MM-dd')

  const last = await fs.readFile(markerPath, 'utf-8').then(
    (text) => text.trim(),
    () => '',
  )
  if (last === today) return null

  try {
    await fs.access(storePath)
  } catch {
    return null
  }

  const base = path.basename(storePath, path.extname(storePath))
  const target = path.join(backupDir, `${base}_${now.toFormat('yyyyMMdd_HHmmss')}.csv`)
  await fs.mkdir(backupDir, { recursive: true })
  await fs.copyFile(storePath, target)
  await fs.writeFile(markerPath, today, 'utf-8')
  log.info({ target }, 'Store backed up')
  return target
}
