import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters'
import { env } from '../../env.js'

export const CHUNK_SEPARATORS = ['\n\n', '\n', '. ', ' ', '']

export function createSplitter(opts: { chunkSize?: number; chunkOverlap?: number } = {}) {
  return new RecursiveCharacterTextSplitter({
    chunkSize: opts.chunkSize ?? env.RAG_CHUNK_SIZE,
    chunkOverlap: opts.chunkOverlap ?? env.RAG_CHUNK_OVERLAP,
    separators: CHUNK_SEPARATORS
  })
}

/** Split extracted text into overlapping chunks, dropping blank ones. */
export async function splitText(text: string, opts: { chunkSize?: number; chunkOverlap?: number } = {}) {
  const chunks = await createSplitter(opts).splitText(text)
  return chunks.map((c) => c.trim()).filter((c) => c.length > 0)
}
