import { Router } from 'express'
import { z } from 'zod'
import { badRequest, conflict, notFound } from '../errors.js'
import { log } from '../logger.js'
import { authUser, requireAuth, requireRole } from '../middleware/auth.js'
import { isHtmx, sendNotice } from '../middleware/htmx.js'
import { requestIdOf } from '../middleware/requestContext.js'
import { singleFile } from '../middleware/upload.js'
import { findCancerType } from '../repos/cancerTypeRepo.js'
import { chatUsage, listFeedback } from '../repos/chatRepo.js'
import {
  chatDocumentHashExists,
  createChatDocument,
  findChatDocument,
  listChatDocuments,
  updateChatDocument
} from '../repos/chatDocumentRepo.js'
import { recordCreate, recordDelete, recordUpdate } from '../services/audit.js'
import { clearDocument, healthCheck, indexInBackground, processDocument } from '../services/chat/chatService.js'
import { responseCache } from '../services/chat/responseCache.js'
import { CHAT_DOCUMENT_EXTENSIONS, fileExtension, isChatDocumentExtension } from '../services/rag/extract.js'
import { saveUploadThen, sha256 } from '../services/storage/files.js'
import { isoDay, queryString, respond, route, uuidParam } from './handler.js'

const DOCUMENTS_PAGE_SIZE = 20
const FEEDBACK_PAGE_SIZE = 50
const DEFAULT_ANALYTICS_DAYS = 30
const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Knowledge-base management and chat analytics, mounted at
 * /api/v1/chat/admin for administrators.
 */
const router = Router()

router.use(requireAuth, requireRole('administrator'))

async function requireOrganType(cancerTypeId: number | null) {
  if (cancerTypeId === null) return null
  const cancerType = await findCancerType(cancerTypeId)
  if (!cancerType) throw badRequest('Selected cancer type does not exist.')
  if (!cancerType.isOrgan) throw badRequest('Reference documents can only be linked to an organ-level cancer type.')
  return cancerType
}

async function loadDocument(id: string) {
  const doc = await findChatDocument(id)
  if (!doc) throw notFound('Document not found.')
  return doc
}

function documentAuditState(doc: { title: string; documentType: string; fileName: string; cancerTypeId: number | null }) {
  return { title: doc.title, documentType: doc.documentType, fileName: doc.fileName, cancerTypeId: doc.cancerTypeId }
}

router.get(
  '/documents',
  route('chat.admin.documents', async (req, res) => {
    const cancerType = z.coerce.number().int().positive().safeParse(queryString(req, 'cancerType'))
    const page = await listChatDocuments({
      cancerTypeId: cancerType.success ? cancerType.data : undefined,
      page: req.query.page,
      pageSize: DOCUMENTS_PAGE_SIZE
    })
    res.json({ documents: page.items, pagination: page.pagination })
  })
)

const optionalId = z.preprocess(
  (v) => (v === '' || v === undefined || v === null ? null : v),
  z.coerce.number().int().positive().nullable()
)

const uploadFieldsSchema = z.object({
  title: z.string().trim().max(255).optional(),
  description: z.string().trim().optional().default(''),
  documentType: z.string().trim().max(50).optional(),
  cancerTypeId: optionalId
})

router.post(
  '/documents',
  singleFile('file'),
  route('chat.admin.documents.upload', async (req, res) => {
    const file = req.file
    if (!file) throw badRequest('Please choose a file to upload.')

    const ext = fileExtension(file.originalname)
    if (!isChatDocumentExtension(ext)) {
      throw badRequest(`Unsupported file extension. Allowed extensions: ${CHAT_DOCUMENT_EXTENSIONS.join(', ')}.`)
    }
    if (ext === 'doc') throw badRequest('Legacy .doc files cannot be indexed. Please upload the document as .docx or PDF.')

    const fields = uploadFieldsSchema.parse(req.body ?? {})
    await requireOrganType(fields.cancerTypeId)
    if (await chatDocumentHashExists(sha256(file.buffer))) {
      throw conflict('This document has already been uploaded.')
    }

    const upload = { area: 'chat_documents', originalName: file.originalname, buffer: file.buffer }
    const { doc, size } = await saveUploadThen(upload, async (stored) => {
      const created = await createChatDocument({
        title: fields.title || file.originalname.replace(/\.[^.]+$/, ''),
        description: fields.description,
        documentType: fields.documentType || ext.toUpperCase(),
        filePath: stored.filePath,
        fileName: stored.fileName,
        cancerTypeId: fields.cancerTypeId,
        fileHash: stored.fileHash,
        uploadedBy: authUser(req).id
      })
      return { doc: created, size: stored.size }
    })
    await recordCreate('ChatDocument', doc.id, documentAuditState(doc))
    log('info', 'chat.admin.documents.uploaded', { requestId: requestIdOf(res), documentId: doc.id, size })

    indexInBackground(doc)
    respond(
      req,
      res,
      { status: 'success', document: doc },
      { status: 201, notice: 'Document uploaded. Indexing has started.', trigger: 'documentUploaded' }
    )
  })
)

const editDocumentSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  cancerTypeId: optionalId.optional()
})

router.patch(
  '/documents/:id',
  route('chat.admin.documents.edit', async (req, res) => {
    const doc = await loadDocument(uuidParam(req, 'id'))
    const patch = editDocumentSchema.parse(req.body)
    if (patch.cancerTypeId !== undefined) await requireOrganType(patch.cancerTypeId)

    const updated = await updateChatDocument(doc.id, patch)
    if (!updated) throw notFound('Document not found.')
    responseCache.clear()
    await recordUpdate('ChatDocument', doc.id, documentAuditState(doc), documentAuditState(updated))
    respond(req, res, { status: 'success', document: updated }, { notice: 'Document updated.' })
  })
)

router.delete(
  '/documents/:id',
  route('chat.admin.documents.delete', async (req, res) => {
    const doc = await loadDocument(uuidParam(req, 'id'))
    await clearDocument(doc)
    await recordDelete('ChatDocument', doc.id, documentAuditState(doc))
    respond(req, res, { status: 'success' }, { notice: 'Document deleted.', trigger: 'documentDeleted' })
  })
)

router.post(
  '/documents/:id/reindex',
  route('chat.admin.documents.reindex', async (req, res) => {
    const doc = await loadDocument(uuidParam(req, 'id'))
    const chunks = await processDocument(doc)
    respond(req, res, { status: 'success', chunks }, { notice: `Document indexed into ${chunks} chunks.` })
  })
)

function parseDay(value: string) {
  if (value === '') return null
  const day = isoDay.safeParse(value)
  if (!day.success) throw badRequest('Invalid date range.')
  return new Date(`${day.data}T00:00:00Z`)
}

/**
 * Analytics window. endDate is inclusive, so the range ends at the start of
 * the following day.
 */
export function analyticsRange(startDate: string, endDate: string, now = new Date()) {
  const startDay = parseDay(startDate)
  const endDay = parseDay(endDate)
  const endAt = endDay ? new Date(endDay.getTime() + DAY_MS) : now
  const startAt = startDay ?? new Date(endAt.getTime() - DEFAULT_ANALYTICS_DAYS * DAY_MS)
  if (startAt >= endAt) throw badRequest('Start date must be before end date.')
  return { start: startAt, end: endAt }
}

router.get(
  '/analytics',
  route('chat.admin.analytics', async (req, res) => {
    const { start, end } = analyticsRange(queryString(req, 'startDate'), queryString(req, 'endDate'))
    const usage = await chatUsage(start, end)
    const avgMessagesPerSession =
      usage.totalSessions > 0 ? Math.round((usage.totalMessages / usage.totalSessions) * 10) / 10 : 0
    const helpfulRate =
      usage.feedbackTotal > 0 ? Math.round((usage.feedbackHelpful / usage.feedbackTotal) * 1000) / 10 : 0

    res.json({
      range: { start: start.toISOString(), end: end.toISOString() },
      totalSessions: usage.totalSessions,
      totalMessages: usage.totalMessages,
      uniqueUsers: usage.uniqueUsers,
      avgMessagesPerSession,
      feedback: { total: usage.feedbackTotal, helpful: usage.feedbackHelpful, helpfulRate },
      cache: responseCache.stats()
    })
  })
)

router.get(
  '/feedback',
  route('chat.admin.feedback', async (req, res) => {
    const raw = queryString(req, 'helpful')
    const helpful = raw === 'true' ? true : raw === 'false' ? false : undefined
    const page = await listFeedback({ helpful, page: req.query.page, pageSize: FEEDBACK_PAGE_SIZE })
    res.json({ feedback: page.items, pagination: page.pagination })
  })
)

router.get(
  '/health',
  route('chat.admin.health', async (req, res) => {
    const health = await healthCheck()
    if (isHtmx(req)) return sendNotice(res, `Service ${health.service}`)
    res.status(health.service === 'healthy' ? 200 : 503).json(health)
  })
)

export default router
