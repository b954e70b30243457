import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { atomicWriteFile, isErrnoException } from './atomic.js'

export interface BackupEntry {
  file: string
  path: string
  /** ISO time the backup was taken (second precision, UTC). */
  createdAt: string
  /** Revision of the canonical document that was backed up. */
  revision: number
}

const BACKUP_NAME = /^state\.(\d{14})\.(\d+)\.json$/

export function formatBackupStamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14)
}

export function backupFileName(date: Date, revision: number): string {
  return `state.${formatBackupStamp(date)}.${revision}.json`
}

function stampToIso(stamp: string): string {
  return (
    `${stamp.slice(0, 4)}-${stamp.slice(4, 6)}-${stamp.slice(6, 8)}` +
    `T${stamp.slice(8, 10)}:${stamp.slice(10, 12)}:${stamp.slice(12, 14)}Z`
  )
}

export function parseBackupFileName(
  file: string
): { stamp: string; revision: number; createdAt: string } | null {
  const match = BACKUP_NAME.exec(file)
  if (!match) return null
  const [, stamp = '', revision = ''] = match
  return { stamp, revision: Number.parseInt(revision, 10), createdAt: stampToIso(stamp) }
}

/** Backups newest first. A missing directory has no backups. */
export async function listBackups(dir: string): Promise<BackupEntry[]> {
  let names: string[]
  try {
    names = await fs.readdir(dir)
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return []
    throw err
  }

  const entries: Array<BackupEntry & { stamp: string }> = []
  for (const file of names) {
    const parsed = parseBackupFileName(file)
    if (!parsed) continue
    entries.push({ file, path: path.join(dir, file), ...parsed })
  }
  entries.sort((a, b) =>
    a.stamp === b.stamp ? b.revision - a.revision : a.stamp < b.stamp ? 1 : -1
  )
  return entries.map(({ file, path: entryPath, createdAt, revision }) => ({
    file,
    path: entryPath,
    createdAt,
    revision,
  }))
}

export async function writeBackup(
  dir: string,
  bytes: Buffer,
  revision: number,
  now: Date
): Promise<string> {
  const target = path.join(dir, backupFileName(now, revision))
  await atomicWriteFile(target, bytes)
  return target
}

/** Deletes all but the newest `retention` backups and returns the removed paths. */
export async function pruneBackups(dir: string, retention: number): Promise<string[]> {
  const backups = await listBackups(dir)
  const stale = backups.slice(Math.max(retention, 0))
  for (const entry of stale) {
    await fs.rm(entry.path, { force: true })
  }
  return stale.map((entry) => entry.path)
}
