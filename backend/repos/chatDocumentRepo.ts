import { randomUUID } from 'node:crypto'
import { pool, withTransaction } from '../db/pool.js'
import { paginate, type Page } from '../db/pagination.js'
import { fragment, join, raw, sql, where } from '../db/sql.js'

export type IndexStatus = 'indexed' | 'indexing' | 'pending'

type ChatDocumentRow = {
  id: string
  title: string
  description: string
  document_type: string
  file_path: string
  file_name: string
  cancer_type_id: number | null
  cancer_type_name: string | null
  indexed: boolean
  indexed_at: Date | null
  file_hash: string | null
  uploaded_by: number | null
  created_at: Date
  updated_at: Date
  chunk_count: number
}

export type ChatDocument = {
  id: string
  title: string
  description: string
  documentType: string
  filePath: string
  fileName: string
  cancerTypeId: number | null
  cancerTypeName: string | null
  indexed: boolean
  indexedAt: Date | null
  fileHash: string | null
  uploadedBy: number | null
  createdAt: Date
  updatedAt: Date
  chunkCount: number
  status: IndexStatus
}

export function indexStatus(doc: { indexed: boolean; chunkCount: number }): IndexStatus {
  if (doc.indexed) return 'indexed'
  return doc.chunkCount > 0 ? 'indexing' : 'pending'
}

const SELECT_DOCUMENT = raw(`
  SELECT d.id, d.title, d.description, d.document_type, d.file_path, d.file_name, d.cancer_type_id,
         c.name AS cancer_type_name, d.indexed, d.indexed_at, d.file_hash, d.uploaded_by, d.created_at, d.updated_at,
         (SELECT count(*)::int FROM chat_document_chunks k WHERE k.document_id = d.id) AS chunk_count
  FROM chat_documents d
  LEFT JOIN cancer_types c ON c.id = d.cancer_type_id
`)

function toDocument(row: ChatDocumentRow): ChatDocument {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    documentType: row.document_type,
    filePath: row.file_path,
    fileName: row.file_name,
    cancerTypeId: row.cancer_type_id,
    cancerTypeName: row.cancer_type_name,
    indexed: row.indexed,
    indexedAt: row.indexed_at,
    fileHash: row.file_hash,
    uploadedBy: row.uploaded_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    chunkCount: row.chunk_count,
    status: indexStatus({ indexed: row.indexed, chunkCount: row.chunk_count })
  }
}

export async function findChatDocument(id: string) {
  const q = sql`${SELECT_DOCUMENT} WHERE d.id = ${id}::uuid`
  const res = await pool.query<ChatDocumentRow>(q.text, q.values)
  return res.rows[0] ? toDocument(res.rows[0]) : null
}

export async function listChatDocuments(args: {
  cancerTypeId?: number
  page?: unknown
  pageSize: number
}): Promise<Page<ChatDocument>> {
  const filter = where(args.cancerTypeId === undefined ? [] : [fragment`d.cancer_type_id = ${args.cancerTypeId}`])
  const countQ = sql`SELECT count(*)::int AS total FROM chat_documents d ${filter}`
  const countRes = await pool.query<{ total: number }>(countQ.text, countQ.values)
  const pagination = paginate(countRes.rows[0]?.total ?? 0, args.page, args.pageSize)

  const q = sql`
    ${SELECT_DOCUMENT} ${filter}
    ORDER BY d.created_at DESC, d.id DESC
    LIMIT ${pagination.pageSize} OFFSET ${pagination.offset}
  `
  const res = await pool.query<ChatDocumentRow>(q.text, q.values)
  return { items: res.rows.map(toDocument), pagination }
}

export async function chatDocumentHashExists(fileHash: string) {
  const q = sql`SELECT 1 FROM chat_documents WHERE file_hash = ${fileHash}`
  const res = await pool.query(q.text, q.values)
  return (res.rowCount ?? 0) > 0
}

export async function createChatDocument(args: {
  title: string
  description: string
  documentType: string
  filePath: string
  fileName: string
  cancerTypeId: number | null
  fileHash: string
  uploadedBy: number | null
}) {
  const id = randomUUID()
  const q = sql`
    INSERT INTO chat_documents (id, title, description, document_type, file_path, file_name, cancer_type_id, file_hash, uploaded_by)
    VALUES (${id}::uuid, ${args.title}, ${args.description}, ${args.documentType}, ${args.filePath}, ${args.fileName},
            ${args.cancerTypeId}, ${args.fileHash}, ${args.uploadedBy})
  `
  await pool.query(q.text, q.values)
  const created = await findChatDocument(id)
  if (!created) throw new Error('Chat document insert returned no row')
  return created
}

export async function updateChatDocument(id: string, patch: { title?: string; cancerTypeId?: number | null }) {
  const assignments = [fragment`updated_at = now()`]
  if (patch.title !== undefined) assignments.push(fragment`title = ${patch.title}`)
  if (patch.cancerTypeId !== undefined) assignments.push(fragment`cancer_type_id = ${patch.cancerTypeId}`)
  const q = sql`UPDATE chat_documents SET ${join(assignments, ', ')} WHERE id = ${id}::uuid`
  await pool.query(q.text, q.values)
  return findChatDocument(id)
}

export async function deleteChatDocument(id: string) {
  const q = sql`DELETE FROM chat_documents WHERE id = ${id}::uuid`
  await pool.query(q.text, q.values)
}

export async function setDocumentIndexed(id: string, indexed: boolean) {
  const q = sql`
    UPDATE chat_documents
    SET indexed = ${indexed}, indexed_at = ${indexed ? new Date().toISOString() : null}::timestamptz, updated_at = now()
    WHERE id = ${id}::uuid
  `
  await pool.query(q.text, q.values)
}

export async function deleteChunks(documentId: string) {
  const q = sql`DELETE FROM chat_document_chunks WHERE document_id = ${documentId}::uuid`
  const res = await pool.query(q.text, q.values)
  return res.rowCount ?? 0
}

export type ChunkMetadata = {
  source: string
  title: string
  documentType: string
  cancerType: string | null
  chunkIndex: number
}

export type NewChunk = { chunkIndex: number; content: string; metadata: ChunkMetadata; embedding: number[] }

/** Replace every chunk of a document in one transaction. */
export async function replaceChunks(documentId: string, chunks: NewChunk[]) {
  await withTransaction(async (client) => {
    const remove = sql`DELETE FROM chat_document_chunks WHERE document_id = ${documentId}::uuid`
    await client.query(remove.text, remove.values)
    for (const chunk of chunks) {
      const insert = sql`
        INSERT INTO chat_document_chunks (id, document_id, chunk_index, content, metadata, embedding)
        VALUES (${randomUUID()}::uuid, ${documentId}::uuid, ${chunk.chunkIndex}, ${chunk.content},
                ${JSON.stringify(chunk.metadata)}::jsonb, ${chunk.embedding}::double precision[])
      `
      await client.query(insert.text, insert.values)
    }
  })
}

export type StoredChunk = {
  id: string
  documentId: string
  documentTitle: string
  chunkIndex: number
  content: string
  embedding: number[]
}

/**
 * Embedded chunks of indexed documents a question may draw on: those tagged
 * with the organ type plus those with no cancer type at all.
 */
export async function loadSearchableChunks(organTypeId: number | null) {
  const scope =
    organTypeId === null
      ? fragment`TRUE`
      : fragment`(d.cancer_type_id = ${organTypeId} OR d.cancer_type_id IS NULL)`
  const q = sql`
    SELECT k.id, k.document_id, d.title AS document_title, k.chunk_index, k.content, k.embedding
    FROM chat_document_chunks k
    JOIN chat_documents d ON d.id = k.document_id
    WHERE d.indexed AND k.embedding IS NOT NULL AND ${scope}
  `
  const res = await pool.query<{
    id: string
    document_id: string
    document_title: string
    chunk_index: number
    content: string
    embedding: number[]
  }>(q.text, q.values)
  return res.rows.map(
    (row): StoredChunk => ({
      id: row.id,
      documentId: row.document_id,
      documentTitle: row.document_title,
      chunkIndex: row.chunk_index,
      content: row.content,
      embedding: row.embedding
    })
  )
}

export async function chunkStoreStats() {
  const res = await pool.query<{ documents: number; indexed_documents: number; chunks: number }>(`
    SELECT
      (SELECT count(*)::int FROM chat_documents) AS documents,
      (SELECT count(*)::int FROM chat_documents WHERE indexed) AS indexed_documents,
      (SELECT count(*)::int FROM chat_document_chunks) AS chunks
  `)
  const row = res.rows[0]
  return {
    documents: row?.documents ?? 0,
    indexedDocuments: row?.indexed_documents ?? 0,
    chunks: row?.chunks ?? 0
  }
}
