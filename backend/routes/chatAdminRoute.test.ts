import { access } from 'node:fs/promises'
import type { Server } from 'node:http'
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../app.js'
import { findCancerType, type CancerType } from '../repos/cancerTypeRepo.js'
import {
  chatDocumentHashExists,
  createChatDocument,
  findChatDocument,
  updateChatDocument,
  type ChatDocument
} from '../repos/chatDocumentRepo.js'
import { chatUsage } from '../repos/chatRepo.js'
import { findUserById, type User } from '../repos/userRepo.js'
import { recordCreate } from '../services/audit.js'
import { signAccessToken } from '../services/auth/tokens.js'
import { processDocument } from '../services/chat/chatService.js'
import { responseCache } from '../services/chat/responseCache.js'
import { resolveMediaPath } from '../services/storage/files.js'
import { analyticsRange } from './chatAdminRoute.js'

vi.mock('../repos/userRepo.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../repos/userRepo.js')>()),
  findUserById: vi.fn()
}))

vi.mock('../repos/cancerTypeRepo.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../repos/cancerTypeRepo.js')>()),
  findCancerType: vi.fn()
}))

vi.mock('../repos/chatDocumentRepo.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../repos/chatDocumentRepo.js')>()),
  chatDocumentHashExists: vi.fn(),
  createChatDocument: vi.fn(),
  findChatDocument: vi.fn(),
  updateChatDocument: vi.fn()
}))

vi.mock('../repos/chatRepo.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../repos/chatRepo.js')>()),
  chatUsage: vi.fn()
}))

vi.mock('../services/audit.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../services/audit.js')>()),
  recordCreate: vi.fn(),
  recordDelete: vi.fn(),
  recordUpdate: vi.fn()
}))

vi.mock('../services/chat/chatService.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../services/chat/chatService.js')>()),
  indexInBackground: vi.fn(),
  processDocument: vi.fn()
}))

const NOW = new Date('2026-03-10T12:00:00Z')

const admin: User = {
  id: 1,
  email: 'admin@example.com',
  passwordHash: 'hashed',
  firstName: 'Ada',
  lastName: 'Moss',
  dateOfBirth: null,
  gender: null,
  phoneNumber: '',
  numericalIdentifier: null,
  role: 'administrator',
  language: 'en',
  assignedDoctorId: null,
  specialtyName: '',
  isActive: true,
  isEmailVerified: true,
  dateJoined: NOW,
  lastLogin: null
}

const lung: CancerType = {
  id: 10,
  name: 'Lung',
  description: '',
  parentId: null,
  parentName: null,
  isOrgan: true,
  fullName: 'Lung'
}

const guide: ChatDocument = {
  id: '3c9e2f1a-7b4d-4e8a-9f10-2a3b4c5d6e7f',
  title: 'Care guide',
  description: '',
  documentType: 'PDF',
  filePath: 'chat_documents/2026/03/guide.pdf',
  fileName: 'guide.pdf',
  cancerTypeId: 10,
  cancerTypeName: 'Lung',
  indexed: true,
  indexedAt: NOW,
  fileHash: 'abc',
  uploadedBy: 1,
  createdAt: NOW,
  updatedAt: NOW,
  chunkCount: 4,
  status: 'indexed'
}

let server: Server
let baseUrl: string
const authHeader = { authorization: `Bearer ${signAccessToken(admin)}` }

beforeAll(async () => {
  server = createApp().listen(0)
  await new Promise<void>((resolve) => server.once('listening', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('Expected a TCP address')
  baseUrl = `http://127.0.0.1:${address.port}/api/v1/chat/admin`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
})

beforeEach(() => {
  vi.clearAllMocks()
  responseCache.clear()
  vi.mocked(findUserById).mockResolvedValue(admin)
})

function upload(fileName: string, fields: Record<string, string> = {}) {
  const form = new FormData()
  form.append('file', new Blob(['Rest and hydrate.']), fileName)
  for (const [name, value] of Object.entries(fields)) form.append(name, value)
  return fetch(`${baseUrl}/documents`, { method: 'POST', headers: authHeader, body: form })
}

describe('POST /documents', () => {
  it('lists the allowed extensions for an unknown one', async () => {
    const res = await upload('notes.exe')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Unsupported file extension. Allowed extensions: pdf, doc, docx, txt.' })
  })

  it('refuses legacy .doc files before storing anything', async () => {
    const res = await upload('notes.doc')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'Legacy .doc files cannot be indexed. Please upload the document as .docx or PDF.'
    })
    expect(chatDocumentHashExists).not.toHaveBeenCalled()
    expect(createChatDocument).not.toHaveBeenCalled()
  })

  it('only links documents to an organ-level type', async () => {
    vi.mocked(findCancerType).mockResolvedValue({ ...lung, id: 11, parentId: 10, isOrgan: false })

    const res = await upload('notes.txt', { cancerTypeId: '11' })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'Reference documents can only be linked to an organ-level cancer type.'
    })
  })

  it('rejects content that is already in the knowledge base', async () => {
    vi.mocked(chatDocumentHashExists).mockResolvedValue(true)

    const res = await upload('notes.txt')

    expect(res.status).toBe(409)
    expect(await res.json()).toEqual({ error: 'This document has already been uploaded.' })
  })

  it('removes the stored file when the document row cannot be written', async () => {
    vi.mocked(chatDocumentHashExists).mockResolvedValue(false)
    vi.mocked(createChatDocument).mockRejectedValue(new Error('insert failed'))

    const res = await upload('notes.txt')

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Something went wrong. Please try again.' })
    const filePath = vi.mocked(createChatDocument).mock.calls[0]?.[0].filePath ?? ''
    expect(filePath).toMatch(/^chat_documents\/\d{4}\/\d{2}\/[0-9a-f-]+-notes\.txt$/)
    await expect(access(resolveMediaPath(filePath))).rejects.toThrow()
    expect(recordCreate).not.toHaveBeenCalled()
  })
})

describe('PATCH /documents/:id', () => {
  it('drops cached answers once the document changed', async () => {
    responseCache.set('how do I rest?', 'Rest and hydrate.')
    vi.mocked(findChatDocument).mockResolvedValue(guide)
    vi.mocked(updateChatDocument).mockResolvedValue({ ...guide, title: 'Updated guide' })

    const res = await fetch(`${baseUrl}/documents/${guide.id}`, {
      method: 'PATCH',
      headers: { 'content-type': 'application/json', ...authHeader },
      body: JSON.stringify({ title: 'Updated guide' })
    })

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: 'success', document: { title: 'Updated guide' } })
    expect(vi.mocked(updateChatDocument).mock.calls[0]).toEqual([guide.id, { title: 'Updated guide' }])
    expect(responseCache.stats().size).toBe(0)
  })
})

describe('POST /documents/:id/reindex', () => {
  it('reports how many chunks were built', async () => {
    vi.mocked(findChatDocument).mockResolvedValue(guide)
    vi.mocked(processDocument).mockResolvedValue(12)

    const res = await fetch(`${baseUrl}/documents/${guide.id}/reindex`, { method: 'POST', headers: authHeader })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'success', chunks: 12 })
    expect(processDocument).toHaveBeenCalledWith(guide)
  })

  it('answers 404 for an unknown document', async () => {
    vi.mocked(findChatDocument).mockResolvedValue(null)

    const res = await fetch(`${baseUrl}/documents/${guide.id}/reindex`, { method: 'POST', headers: authHeader })

    expect(res.status).toBe(404)
    expect(processDocument).not.toHaveBeenCalled()
  })
})

describe('GET /analytics', () => {
  it('rounds the averages to one decimal over the inclusive range', async () => {
    vi.mocked(chatUsage).mockResolvedValue({
      totalSessions: 3,
      totalMessages: 10,
      uniqueUsers: 2,
      feedbackTotal: 3,
      feedbackHelpful: 2
    })

    const res = await fetch(`${baseUrl}/analytics?startDate=2026-03-01&endDate=2026-03-07`, { headers: authHeader })

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      range: { start: '2026-03-01T00:00:00.000Z', end: '2026-03-08T00:00:00.000Z' },
      totalSessions: 3,
      totalMessages: 10,
      uniqueUsers: 2,
      avgMessagesPerSession: 3.3,
      feedback: { total: 3, helpful: 2, helpfulRate: 66.7 }
    })
    expect(chatUsage).toHaveBeenCalledWith(new Date('2026-03-01T00:00:00Z'), new Date('2026-03-08T00:00:00Z'))
  })

  it('reports zero rates when nothing happened', async () => {
    vi.mocked(chatUsage).mockResolvedValue({
      totalSessions: 0,
      totalMessages: 0,
      uniqueUsers: 0,
      feedbackTotal: 0,
      feedbackHelpful: 0
    })

    const res = await fetch(`${baseUrl}/analytics?startDate=2026-03-01&endDate=2026-03-07`, { headers: authHeader })

    expect(await res.json()).toMatchObject({ avgMessagesPerSession: 0, feedback: { helpfulRate: 0 } })
  })

  it('rejects a day that is not on the calendar', async () => {
    const res = await fetch(`${baseUrl}/analytics?startDate=2026-02-30&endDate=2026-03-07`, { headers: authHeader })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Invalid date range.' })
    expect(chatUsage).not.toHaveBeenCalled()
  })
})

describe('analyticsRange', () => {
  it('treats the end date as inclusive', () => {
    expect(analyticsRange('2026-03-01', '2026-03-07')).toEqual({
      start: new Date('2026-03-01T00:00:00Z'),
      end: new Date('2026-03-08T00:00:00Z')
    })
  })

  it('defaults to the thirty days before now', () => {
    const now = new Date('2026-03-10T12:00:00Z')
    expect(analyticsRange('', '', now)).toEqual({ start: new Date('2026-02-08T12:00:00Z'), end: now })
  })

  it('rejects a start after the end', () => {
    expect(() => analyticsRange('2026-03-07', '2026-03-01')).toThrow('Start date must be before end date.')
  })

  it('rejects dates that do not exist', () => {
    expect(() => analyticsRange('2026-13-45', '2026-03-01')).toThrow('Invalid date range.')
    expect(() => analyticsRange('2026-02-30', '2026-03-01')).toThrow('Invalid date range.')
  })
})
