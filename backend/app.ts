import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import cookieParser from 'cookie-parser'
import crypto from 'crypto'
import { env } from './env.js'
import { notFound, sendError } from './errors.js'
import { log } from './logger.js'
import { requestContext, requestIdOf } from './middleware/requestContext.js'
import accountsRoutes from './routes/accountsRoute.js'
import auditRoutes from './routes/auditRoute.js'
import authRoutes from './routes/authRoute.js'
import chatAdminRoutes from './routes/chatAdminRoute.js'
import chatRoutes from './routes/chatRoute.js'
import medicalAdminRoutes from './routes/medicalAdminRoute.js'
import medicalRoutes from './routes/medicalRoute.js'

function requestLogging(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now()
  const requestId = crypto.randomUUID()
  res.setHeader('x-request-id', requestId)
  res.locals.requestId = requestId

  const baseMeta = {
    requestId,
    method: req.method,
    path: req.originalUrl,
    ip: req.ip
  }

  log('info', 'request.start', {
    ...baseMeta,
    contentType: req.headers['content-type']
  })

  res.on('finish', () => {
    log('info', 'request.finish', {
      ...baseMeta,
      status: res.statusCode,
      durationMs: Date.now() - startedAt
    })
  })

  next()
}

export function createApp() {
  const app = express()

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: true
    })
  )

  app.use(express.json({ limit: '256kb' }))
  app.use(cookieParser())
  app.use(requestLogging)
  app.use(requestContext)

  app.get('/api/v1/health', (_req: Request, res: Response) => {
    res.json({ ok: true })
  })

  app.use('/api/v1/auth', authRoutes)
  app.use('/api/v1/accounts', accountsRoutes)
  app.use('/api/v1/audit', auditRoutes)
  app.use('/api/v1/medical/admin', medicalAdminRoutes)
  app.use('/api/v1/medical', medicalRoutes)
  app.use('/api/v1/chat/admin', chatAdminRoutes)
  app.use('/api/v1/chat', chatRoutes)

  app.use((req: Request, res: Response) => {
    sendError(req, res, notFound(), 'request')
  })

  // Malformed JSON bodies and anything else express itself rejects.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      log('warn', 'request.body_invalid', { requestId: requestIdOf(res), message: err.message })
      return res.status(400).json({ error: 'Invalid request' })
    }
    sendError(req, res, err, 'request')
  })

  return app
}
