import { env } from '../../env.js'
import { errorMeta, notFound } from '../../errors.js'
import { log } from '../../logger.js'
import { pool } from '../../db/pool.js'
import {
  createSession,
  findUserSession,
  getRecentMessages,
  insertMessage,
  latestActiveSession,
  type ChatMessage,
  type ChatSession
} from '../../repos/chatRepo.js'
import {
  chunkStoreStats,
  deleteChatDocument,
  deleteChunks,
  loadSearchableChunks,
  replaceChunks,
  setDocumentIndexed,
  type ChatDocument,
  type NewChunk
} from '../../repos/chatDocumentRepo.js'
import { findCancerType } from '../../repos/cancerTypeRepo.js'
import { findRecordByPatient } from '../../repos/medicalRepo.js'
import { findUserById, fullName, type User } from '../../repos/userRepo.js'
import { embedDocuments, embedQuery, generateChatReply, isLlmConfigured, type ChatTurn } from '../llm/models.js'
import { takeRecentWithinTokenBudget } from '../llm/tokenBudget.js'
import { extractText } from '../rag/extract.js'
import { splitText } from '../rag/chunk.js'
import { rankBySimilarity } from '../rag/retrieve.js'
import { removeStoredFile, resolveMediaPath } from '../storage/files.js'
import { isEmergencyMessage } from './emergency.js'
import { PromptBuilder, buildAnswerPrompt, type PatientContext } from './prompts.js'
import { responseCache } from './responseCache.js'

export const APOLOGY_RESPONSE =
  'I apologize, but I encountered an error while processing your request. ' +
  'Please try again later or contact your healthcare provider if this is urgent.'

const EMBED_BATCH_SIZE = 64

/** `Chat - 2025-01-31 14:05` style titles, in UTC. */
export function sessionTitle(prefix: string, now = new Date()) {
  const iso = now.toISOString()
  return `${prefix} ${iso.slice(0, 10)} ${iso.slice(11, 16)}`
}

/** Most recently active session, or a fresh one when the user has none. */
export async function createOrContinueSession(user: Pick<User, 'id'>) {
  const existing = await latestActiveSession(user.id)
  if (existing) return existing
  const created = await createSession({ userId: user.id, title: sessionTitle('Chat -') })
  log('info', 'chat.session.created', { userId: user.id, sessionId: created.id })
  return created
}

async function resolveSession(user: User, sessionId?: string) {
  if (!sessionId) return createOrContinueSession(user)
  const session = await findUserSession(user.id, sessionId)
  if (!session) throw notFound('Chat session not found.')
  return session
}

type OrganType = { id: number; fullName: string }

/**
 * What the prompt knows about the patient, and the organ-level cancer type
 * used to scope retrieval (a subtype resolves to its parent organ).
 */
export async function loadPatientContext(user: User): Promise<{ patient: PatientContext; organType: OrganType | null }> {
  const [record, doctor] = await Promise.all([
    findRecordByPatient(user.id),
    user.assignedDoctorId === null ? Promise.resolve(null) : findUserById(user.assignedDoctorId)
  ])

  let organType: OrganType | null = null
  const cancerType = record?.cancerType ?? null
  if (cancerType) {
    if (cancerType.parentId === null) {
      organType = { id: cancerType.id, fullName: cancerType.fullName }
    } else {
      const parent = await findCancerType(cancerType.parentId)
      organType = parent ? { id: parent.id, fullName: parent.fullName } : null
    }
  }

  return {
    patient: {
      patientName: fullName(user),
      doctorName: doctor ? fullName(doctor) : null,
      cancerType: cancerType?.fullName ?? null,
      cancerStage: record?.cancerStageText || null,
      pathologyStage: record?.stageGrouping || null,
      treatment: record?.recommendedTreatment || null,
      diagnosisDate: record?.diagnosisDate ?? null
    },
    organType
  }
}

/** Indexed chunks closest to the query, scoped to the organ type plus general documents. */
export async function retrieveChunks(query: string, organTypeId: number | null) {
  const [queryEmbedding, candidates] = await Promise.all([embedQuery(query), loadSearchableChunks(organTypeId)])
  return rankBySimilarity(queryEmbedding, candidates, { topK: env.RAG_TOP_K, minSimilarity: env.RAG_MIN_SIMILARITY })
}

export type GeneratedResponse = {
  response: string
  assistantMessage: ChatMessage
  session: ChatSession
}

/**
 * Answer a chat message from the knowledge base.
 *
 * Emergencies short-circuit to a fixed response. Otherwise the question is
 * answered from retrieved chunks, falling back to a not-found message when
 * nothing relevant is indexed and to an apology when retrieval or the model
 * fails. Both the user message and the reply are persisted.
 */
export async function generateResponse(user: User, text: string, sessionId?: string): Promise<GeneratedResponse> {
  const startedAt = Date.now()
  const session = await resolveSession(user, sessionId)
  const { patient, organType } = await loadPatientContext(user)
  const prompts = new PromptBuilder(patient, user.language)

  if (isEmergencyMessage(text)) {
    const response = prompts.buildEmergencyResponse()
    await insertMessage({ sessionId: session.id, role: 'user', content: text })
    const assistantMessage = await insertMessage({ sessionId: session.id, role: 'assistant', content: response })
    log('warn', 'chat.emergency', { userId: user.id, sessionId: session.id, durationMs: Date.now() - startedAt })
    return { response, assistantMessage, session }
  }

  const recent = await getRecentMessages(session.id, env.CHAT_HISTORY_LIMIT)
  const turns = recent.flatMap((m): ChatTurn[] =>
    m.role === 'system' ? [] : [{ role: m.role, content: m.content }]
  )
  const { selectedNewestToOldest } = takeRecentWithinTokenBudget({
    maxTokens: env.LLM_MAX_CONTEXT_TOKENS,
    newestToOldest: turns.slice().reverse()
  })
  const history = selectedNewestToOldest.slice().reverse()

  await insertMessage({ sessionId: session.id, role: 'user', content: text })

  const cacheContext = { userId: user.id, organTypeId: organType?.id ?? null, language: user.language }
  const cacheable = recent.length === 0
  let response: string
  let outcome: 'cached' | 'not_found' | 'answered' | 'error'

  try {
    const cached = cacheable ? responseCache.get(text, cacheContext) : null
    if (cached) {
      response = cached
      outcome = 'cached'
    } else {
      const query = prompts.buildQueryPrompt(text, organType?.fullName ?? null)
      const retrieved = await retrieveChunks(query, organType?.id ?? null)

      if (retrieved.length === 0) {
        response = prompts.buildNotFoundResponse(text)
        outcome = 'not_found'
      } else {
        const reply = await generateChatReply({
          systemPrompt: prompts.buildSystemPrompt(),
          historyOldestToNewest: history,
          prompt: buildAnswerPrompt(
            retrieved.map((r) => r.item.content),
            text
          )
        })
        if (!reply) throw new Error('Model returned an empty completion')
        response = reply
        outcome = 'answered'
        if (cacheable) responseCache.set(text, response, cacheContext)
      }
    }
  } catch (err) {
    log('error', 'chat.generate.failed', { userId: user.id, sessionId: session.id, ...errorMeta(err) })
    response = APOLOGY_RESPONSE
    outcome = 'error'
  }

  const assistantMessage = await insertMessage({ sessionId: session.id, role: 'assistant', content: response })
  log('info', 'chat.generate.finish', {
    userId: user.id,
    sessionId: session.id,
    outcome,
    historyMessages: history.length,
    durationMs: Date.now() - startedAt
  })
  return { response, assistantMessage, session }
}

async function embedInBatches(texts: string[]) {
  const vectors: number[][] = []
  for (let i = 0; i < texts.length; i += EMBED_BATCH_SIZE) {
    vectors.push(...(await embedDocuments(texts.slice(i, i + EMBED_BATCH_SIZE))))
  }
  return vectors
}

/**
 * (Re)build the chunk index of one reference document. On failure the
 * document is left unindexed and the error propagates.
 */
export async function processDocument(doc: ChatDocument) {
  const startedAt = Date.now()
  await deleteChunks(doc.id)
  await setDocumentIndexed(doc.id, false)

  try {
    const text = await extractText(resolveMediaPath(doc.filePath))
    if (!text) throw new Error('Document contains no extractable text')

    const pieces = await splitText(text)
    const embeddings = await embedInBatches(pieces)

    const chunks = pieces.map(
      (content, chunkIndex): NewChunk => ({
        chunkIndex,
        content,
        embedding: embeddings[chunkIndex] ?? [],
        metadata: {
          source: doc.fileName,
          title: doc.title,
          documentType: doc.documentType,
          cancerType: doc.cancerTypeName,
          chunkIndex
        }
      })
    )

    await replaceChunks(doc.id, chunks)
    await setDocumentIndexed(doc.id, true)
    responseCache.clear()

    log('info', 'chat.document.indexed', { documentId: doc.id, chunks: chunks.length, durationMs: Date.now() - startedAt })
    return chunks.length
  } catch (err) {
    await setDocumentIndexed(doc.id, false)
    log('error', 'chat.document.index_failed', { documentId: doc.id, durationMs: Date.now() - startedAt, ...errorMeta(err) })
    throw err
  }
}

/** Start indexing without holding up the upload response. */
export function indexInBackground(doc: ChatDocument) {
  processDocument(doc).catch((err: unknown) => {
    log('warn', 'chat.document.background_index_failed', { documentId: doc.id, ...errorMeta(err) })
  })
}

/** Remove a reference document together with its chunks and stored file. */
export async function clearDocument(doc: ChatDocument) {
  const removedChunks = await deleteChunks(doc.id)
  await removeStoredFile(doc.filePath)
  await deleteChatDocument(doc.id)
  responseCache.clear()
  log('info', 'chat.document.deleted', { documentId: doc.id, removedChunks })
}

type Check = { ok: boolean; latencyMs?: number; error?: string }

export async function healthCheck() {
  const timed = async <T>(fn: () => Promise<T>): Promise<Check & { detail?: T }> => {
    const t = Date.now()
    try {
      const detail = await fn()
      return { ok: true, latencyMs: Date.now() - t, detail }
    } catch (err) {
      return { ok: false, latencyMs: Date.now() - t, error: err instanceof Error ? err.message : String(err) }
    }
  }

  const database = await timed(() => pool.query('SELECT 1').then(() => true))
  const store = await timed(() => chunkStoreStats())

  return {
    service: database.ok && store.ok ? 'healthy' : 'unhealthy',
    database: { ok: database.ok, latencyMs: database.latencyMs, error: database.error },
    store: { ok: store.ok, latencyMs: store.latencyMs, error: store.error, ...store.detail },
    llm: { configured: isLlmConfigured(), model: env.LLM_MODEL },
    embeddings: { configured: isLlmConfigured(), model: env.EMBEDDING_MODEL },
    cache: responseCache.stats()
  }
}
