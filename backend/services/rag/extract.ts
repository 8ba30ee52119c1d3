import { readFile } from 'node:fs/promises'
import path from 'node:path'
import mammoth from 'mammoth'
import pdf from 'pdf-parse/lib/pdf-parse.js'

export const CHAT_DOCUMENT_EXTENSIONS = ['pdf', 'doc', 'docx', 'txt'] as const
export type ChatDocumentExtension = (typeof CHAT_DOCUMENT_EXTENSIONS)[number]

export function fileExtension(fileName: string) {
  return path.extname(fileName).slice(1).toLowerCase()
}

export function isChatDocumentExtension(ext: string): ext is ChatDocumentExtension {
  return CHAT_DOCUMENT_EXTENSIONS.some((allowed) => allowed === ext)
}

export class UnsupportedDocumentError extends Error {
  constructor(ext: string) {
    super(`Unsupported document type: ${ext || '(none)'}`)
    this.name = 'UnsupportedDocumentError'
  }
}

export async function extractTextFromBuffer(buffer: Buffer, ext: string) {
  switch (ext) {
    case 'pdf': {
      const parsed = await pdf(buffer)
      return parsed.text
    }
    case 'docx': {
      const result = await mammoth.extractRawText({ buffer })
      return result.value
    }
    case 'txt':
      return buffer.toString('utf8')
    default:
      throw new UnsupportedDocumentError(ext)
  }
}

/** Plain text of a stored reference document, chosen by its extension. */
export async function extractText(filePath: string) {
  const buffer = await readFile(filePath)
  const text = await extractTextFromBuffer(buffer, fileExtension(filePath))
  return text.trim()
}
