import * as crypto from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'

/**
 * Compute SHA-256 checksum of a buffer.
 */
export function computeBufferChecksum(buffer: Buffer): string {
  return crypto.createHash('sha256').update(buffer).digest('hex')
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

/**
 * Write a file and flush it to disk before returning. The file is created or
 * truncated in place; use atomicWriteFile when readers must never see a
 * partial write.
 */
export async function writeFileDurable(filePath: string, data: string | Buffer): Promise<void> {
  const handle = await fs.open(filePath, 'w')
  try {
    await handle.writeFile(data)
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Flush a directory entry table so a completed rename survives power loss.
 */
export async function fsyncDirectory(dirPath: string): Promise<void> {
  const handle = await fs.open(dirPath, 'r')
  try {
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Replace `filePath` atomically: write a sibling temp file, fsync it, rename it
 * over the target, then fsync the directory. Readers see the old or the new
 * contents, never a mix.
 */
export async function atomicWriteFile(filePath: string, data: string | Buffer): Promise<void> {
  const dir = path.dirname(filePath)
  await fs.mkdir(dir, { recursive: true })
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`)
  try {
    await writeFileDurable(tmpPath, data)
    await fs.rename(tmpPath, filePath)
  } catch (err) {
    await fs.rm(tmpPath, { force: true })
    throw err
  }
  await fsyncDirectory(dir)
}
