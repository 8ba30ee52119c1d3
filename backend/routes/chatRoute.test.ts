import type { Server } from 'node:http'
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../app.js'
import { findUserAssistantMessage, type ChatMessage, type ChatSession } from '../repos/chatRepo.js'
import { findUserById, type User } from '../repos/userRepo.js'
import { signAccessToken } from '../services/auth/tokens.js'
import { generateResponse } from '../services/chat/chatService.js'
import { chatMessage } from '../views/fragments.js'
import { groupSessionsByDay, historySince } from './chatRoute.js'

vi.mock('../repos/userRepo.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../repos/userRepo.js')>()),
  findUserById: vi.fn()
}))

vi.mock('../repos/chatRepo.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../repos/chatRepo.js')>()),
  findUserAssistantMessage: vi.fn()
}))

vi.mock('../services/chat/chatService.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../services/chat/chatService.js')>()),
  generateResponse: vi.fn()
}))

const NOW = new Date('2026-03-10T12:00:00Z')

const patient: User = {
  id: 7,
  email: 'ana@example.com',
  passwordHash: 'hashed',
  firstName: 'Ana',
  lastName: 'Silva',
  dateOfBirth: null,
  gender: null,
  phoneNumber: '',
  numericalIdentifier: null,
  role: 'patient',
  language: 'en',
  assignedDoctorId: null,
  specialtyName: '',
  isActive: true,
  isEmailVerified: true,
  dateJoined: NOW,
  lastLogin: null
}

function session(id: string, createdAt: Date): ChatSession {
  return { id, userId: 7, title: 'Chat', createdAt, updatedAt: createdAt, active: true }
}

const reply: ChatMessage = {
  id: '6a1f0d2e-3b4c-4d5e-8f60-718293a4b5c6',
  sessionId: '0b6f3c1e-5d0a-4f4b-8a43-3f0c2c9e1a10',
  role: 'assistant',
  content: 'Rest <and> hydrate.',
  createdAt: NOW
}

let server: Server
let baseUrl: string
const authHeader = { authorization: `Bearer ${signAccessToken(patient)}` }

beforeAll(async () => {
  server = createApp().listen(0)
  await new Promise<void>((resolve) => server.once('listening', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('Expected a TCP address')
  baseUrl = `http://127.0.0.1:${address.port}/api/v1/chat`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
})

beforeEach(() => {
  vi.clearAllMocks()
  vi.mocked(findUserById).mockResolvedValue(patient)
})

function postJson(path: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...authHeader, ...headers },
    body: JSON.stringify(body)
  })
}

describe('chat routes', () => {
  it('requires authentication', async () => {
    const res = await fetch(`${baseUrl}/history`)
    expect(res.status).toBe(401)
    expect(await res.json()).toEqual({ error: 'Authentication required' })
  })

  it('rejects a message made only of zero-width characters', async () => {
    const res = await postJson('/message', { message: '\u200B\u200B ' })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Please enter a valid message.' })
    expect(generateResponse).not.toHaveBeenCalled()
  })

  it('answers HTMX validation failures with plain text', async () => {
    const res = await postJson('/message', { message: '' }, { 'hx-request': 'true' })
    expect(res.status).toBe(400)
    expect(await res.text()).toBe('Please enter a valid message.')
  })

  it('returns the reply as JSON', async () => {
    vi.mocked(generateResponse).mockResolvedValue({
      response: reply.content,
      assistantMessage: reply,
      session: session(reply.sessionId, NOW)
    })

    const res = await postJson('/message', { message: '  How do I rest?\u200B ' })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      status: 'success',
      response: 'Rest <and> hydrate.',
      messageId: reply.id,
      sessionId: reply.sessionId
    })
    expect(vi.mocked(generateResponse).mock.calls[0]?.slice(1)).toEqual(['How do I rest?', undefined])
  })

  it('returns the reply as a fragment to HTMX', async () => {
    vi.mocked(generateResponse).mockResolvedValue({
      response: reply.content,
      assistantMessage: reply,
      session: session(reply.sessionId, NOW)
    })

    const res = await postJson('/message', { message: 'How do I rest?' }, { 'hx-request': 'true' })

    expect(res.headers.get('content-type')).toMatch(/^text\/html/)
    expect(await res.text()).toBe(chatMessage(reply))
  })

  it('refuses feedback on a message the user does not own', async () => {
    vi.mocked(findUserAssistantMessage).mockResolvedValue(null)

    const res = await postJson('/feedback', { messageId: reply.id, helpful: true })

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Message not found.' })
  })
})

describe('groupSessionsByDay', () => {
  it('splits sessions at local midnight', () => {
    const now = new Date(2026, 2, 10, 15, 0)
    const morning = session('a', new Date(2026, 2, 10, 8, 0))
    const yesterday = session('b', new Date(2026, 2, 9, 23, 59))

    expect(groupSessionsByDay([morning, yesterday], now)).toEqual({ today: [morning], previous: [yesterday] })
  })
})

describe('historySince', () => {
  it('maps each filter to its lower bound', () => {
    const now = new Date(2026, 2, 10, 15, 0)
    expect(historySince('all', now)).toBeUndefined()
    expect(historySince('today', now)).toEqual(new Date(2026, 2, 10))
    expect(historySince('week', now)).toEqual(new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000))
  })
})
