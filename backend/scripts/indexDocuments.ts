import { errorMeta } from '../errors.js'
import { initDb } from '../db/init.js'
import { pool } from '../db/pool.js'
import { log } from '../logger.js'
import { listChatDocuments, type ChatDocument } from '../repos/chatDocumentRepo.js'
import { processDocument } from '../services/chat/chatService.js'

const PAGE_SIZE = 50

/**
 * Rebuild the chunk index of reference documents from the command line.
 * Pass --all to reindex documents that are already indexed as well.
 */
async function main() {
  const all = process.argv.includes('--all')
  await initDb()

  const documents: ChatDocument[] = []
  for (let page = 1; ; page += 1) {
    const result = await listChatDocuments({ page, pageSize: PAGE_SIZE })
    documents.push(...result.items)
    if (!result.pagination.hasNext) break
  }

  const targets = all ? documents : documents.filter((d) => !d.indexed)
  let indexed = 0
  let failed = 0
  for (const doc of targets) {
    try {
      const chunks = await processDocument(doc)
      indexed += 1
      console.log(`indexed ${doc.title} (${chunks} chunks)`)
    } catch (err) {
      failed += 1
      console.error(`failed ${doc.title}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  log('info', 'scripts.index_documents.finish', { considered: targets.length, indexed, failed })
  console.log(`done: ${indexed} indexed, ${failed} failed, ${documents.length - targets.length} skipped`)
  if (failed > 0) process.exitCode = 1
}

try {
  await main()
} catch (err) {
  log('error', 'scripts.index_documents.failed', errorMeta(err))
  console.error(err)
  process.exitCode = 1
} finally {
  await pool.end()
}
