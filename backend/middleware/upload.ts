import type { NextFunction, Request, Response } from 'express'
import multer from 'multer'
import { env } from '../env.js'
import { HttpError, sendError } from '../errors.js'
import { resumeRequestContext } from './requestContext.js'

const memoryUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: env.MAX_UPLOAD_BYTES, files: 1 }
})

function uploadError(err: unknown) {
  if (!(err instanceof multer.MulterError)) return err
  if (err.code === 'LIMIT_FILE_SIZE') {
    const mb = Math.round(env.MAX_UPLOAD_BYTES / (1024 * 1024))
    return new HttpError(413, `File is too large. Maximum size is ${mb} MB.`)
  }
  return new HttpError(400, err.message)
}

/**
 * Parse a single multipart file into memory (`req.file`), turning multer's
 * errors into HTTP answers and restoring the request context afterwards.
 */
export function singleFile(field: string) {
  const handler = memoryUpload.single(field)
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res, (err?: unknown) => {
      if (err) return sendError(req, res, uploadError(err), 'upload')
      resumeRequestContext(req, res, next)
    })
  }
}
