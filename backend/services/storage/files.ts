import { createHash, randomUUID } from 'node:crypto'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { env } from '../../env.js'
import { errorMeta } from '../../errors.js'
import { log } from '../../logger.js'

export function sha256(buffer: Buffer) {
  return createHash('sha256').update(buffer).digest('hex')
}

/** Keep letters, digits, dot, dash and underscore; everything else becomes `_`. */
export function safeFileName(name: string) {
  const base = path.basename(name).replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '')
  return base || 'file'
}

export function resolveMediaPath(relativePath: string) {
  const root = path.resolve(env.MEDIA_ROOT)
  const resolved = path.resolve(root, relativePath)
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new Error(`Path escapes media root: ${relativePath}`)
  }
  return resolved
}

export type StoredFile = { filePath: string; fileName: string; fileHash: string; size: number }

/**
 * Write an uploaded buffer under MEDIA_ROOT/<area>/<yyyy>/<mm>/ with a unique
 * prefix. The returned filePath is relative to MEDIA_ROOT.
 */
export async function saveUpload(args: { area: string; originalName: string; buffer: Buffer; now?: Date }) {
  const now = args.now ?? new Date()
  const dir = path.posix.join(
    args.area,
    String(now.getUTCFullYear()),
    String(now.getUTCMonth() + 1).padStart(2, '0')
  )
  const fileName = safeFileName(args.originalName)
  const filePath = path.posix.join(dir, `${randomUUID()}-${fileName}`)

  await mkdir(resolveMediaPath(dir), { recursive: true })
  await writeFile(resolveMediaPath(filePath), args.buffer)

  const stored: StoredFile = { filePath, fileName, fileHash: sha256(args.buffer), size: args.buffer.length }
  return stored
}

export async function removeStoredFile(relativePath: string) {
  await rm(resolveMediaPath(relativePath), { force: true })
}

/**
 * Save the upload and hand it to `persist`. If `persist` throws, the file is
 * removed again before the error propagates.
 */
export async function saveUploadThen<T>(
  args: { area: string; originalName: string; buffer: Buffer; now?: Date },
  persist: (stored: StoredFile) => Promise<T>
): Promise<T> {
  const stored = await saveUpload(args)
  try {
    return await persist(stored)
  } catch (err) {
    try {
      await removeStoredFile(stored.filePath)
    } catch (cleanupErr) {
      log('error', 'storage.cleanup.failed', { filePath: stored.filePath, ...errorMeta(cleanupErr) })
    }
    throw err
  }
}
