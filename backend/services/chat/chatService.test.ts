import { beforeEach, describe, expect, it, vi } from 'vitest'
import { loadSearchableChunks } from '../../repos/chatDocumentRepo.js'
import {
  findUserSession,
  getRecentMessages,
  insertMessage,
  latestActiveSession,
  type ChatMessage,
  type ChatSession
} from '../../repos/chatRepo.js'
import { findRecordByPatient } from '../../repos/medicalRepo.js'
import type { User } from '../../repos/userRepo.js'
import { embedQuery, generateChatReply } from '../llm/models.js'
import { APOLOGY_RESPONSE, generateResponse, sessionTitle } from './chatService.js'
import { PromptBuilder, buildAnswerPrompt } from './prompts.js'
import { responseCache } from './responseCache.js'

vi.mock('../../repos/chatRepo.js', () => ({
  createSession: vi.fn(),
  findUserSession: vi.fn(),
  getRecentMessages: vi.fn(),
  insertMessage: vi.fn(),
  latestActiveSession: vi.fn()
}))

vi.mock('../../repos/chatDocumentRepo.js', () => ({
  chunkStoreStats: vi.fn(),
  deleteChatDocument: vi.fn(),
  deleteChunks: vi.fn(),
  loadSearchableChunks: vi.fn(),
  replaceChunks: vi.fn(),
  setDocumentIndexed: vi.fn()
}))

vi.mock('../../repos/cancerTypeRepo.js', () => ({ findCancerType: vi.fn() }))
vi.mock('../../repos/medicalRepo.js', () => ({ findRecordByPatient: vi.fn() }))

vi.mock('../llm/models.js', () => ({
  embedDocuments: vi.fn(),
  embedQuery: vi.fn(),
  generateChatReply: vi.fn(),
  isLlmConfigured: vi.fn(() => false)
}))

const NOW = new Date('2026-03-10T12:00:00Z')

const session: ChatSession = {
  id: '0b6f3c1e-5d0a-4f4b-8a43-3f0c2c9e1a10',
  userId: 7,
  title: 'Chat - 2026-03-10 12:00',
  createdAt: NOW,
  updatedAt: NOW,
  active: true
}

const user: User = {
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

function message(role: ChatMessage['role'], content: string, id = `${role}-${content}`): ChatMessage {
  return { id, sessionId: session.id, role, content, createdAt: NOW }
}

const chunk = {
  id: 'chunk-1',
  documentId: 'doc-1',
  documentTitle: 'Fatigue guide',
  chunkIndex: 0,
  content: 'Short walks help with fatigue.',
  embedding: [1, 0]
}

const prompts = new PromptBuilder(
  {
    patientName: 'Ana Silva',
    doctorName: null,
    cancerType: null,
    cancerStage: null,
    pathologyStage: null,
    treatment: null,
    diagnosisDate: null
  },
  'en'
)

beforeEach(() => {
  vi.clearAllMocks()
  responseCache.clear()
  vi.mocked(latestActiveSession).mockResolvedValue(session)
  vi.mocked(findRecordByPatient).mockResolvedValue(null)
  vi.mocked(getRecentMessages).mockResolvedValue([])
  vi.mocked(insertMessage).mockImplementation(async (args) => message(args.role, args.content))
  vi.mocked(embedQuery).mockResolvedValue([1, 0])
})

describe('sessionTitle', () => {
  it('appends the UTC date and minute', () => {
    expect(sessionTitle('Chat -', new Date('2025-01-31T14:05:09Z'))).toBe('Chat - 2025-01-31 14:05')
  })
})

describe('generateResponse', () => {
  it('answers emergencies without consulting the model', async () => {
    const result = await generateResponse(user, 'I think this is an emergency')

    expect(result.response).toBe(prompts.buildEmergencyResponse())
    expect(generateChatReply).not.toHaveBeenCalled()
    expect(vi.mocked(insertMessage).mock.calls.map(([args]) => args.role)).toEqual(['user', 'assistant'])
  })

  it('falls back to the not-found message when nothing relevant is indexed', async () => {
    vi.mocked(loadSearchableChunks).mockResolvedValue([])

    const result = await generateResponse(user, 'What should I eat?')

    expect(result.response).toBe(prompts.buildNotFoundResponse('What should I eat?'))
    expect(generateChatReply).not.toHaveBeenCalled()
  })

  it('answers from retrieved chunks and serves a repeat question from the cache', async () => {
    vi.mocked(loadSearchableChunks).mockResolvedValue([chunk])
    vi.mocked(generateChatReply).mockResolvedValue('Try a short walk each day.')

    const first = await generateResponse(user, 'How do I manage fatigue?')
    const second = await generateResponse(user, 'how do i manage fatigue?')

    expect(first.response).toBe('Try a short walk each day.')
    expect(second.response).toBe('Try a short walk each day.')
    expect(generateChatReply).toHaveBeenCalledTimes(1)
    expect(generateChatReply).toHaveBeenCalledWith({
      systemPrompt: prompts.buildSystemPrompt(),
      historyOldestToNewest: [],
      prompt: buildAnswerPrompt(['Short walks help with fatigue.'], 'How do I manage fatigue?')
    })
  })

  it('passes earlier turns to the model oldest first', async () => {
    vi.mocked(getRecentMessages).mockResolvedValue([message('user', 'Hello'), message('assistant', 'Hi Ana')])
    vi.mocked(loadSearchableChunks).mockResolvedValue([chunk])
    vi.mocked(generateChatReply).mockResolvedValue('Rest when you need to.')

    await generateResponse(user, 'Any tips for fatigue?')

    expect(vi.mocked(generateChatReply).mock.calls[0]?.[0].historyOldestToNewest).toEqual([
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi Ana' }
    ])
  })

  it('stores an apology when the model fails', async () => {
    vi.mocked(loadSearchableChunks).mockResolvedValue([chunk])
    vi.mocked(generateChatReply).mockRejectedValue(new Error('upstream timeout'))

    const result = await generateResponse(user, 'How do I manage fatigue?')

    expect(result.response).toBe(APOLOGY_RESPONSE)
    expect(result.assistantMessage.content).toBe(APOLOGY_RESPONSE)
  })

  it('rejects a session that does not belong to the user', async () => {
    vi.mocked(findUserSession).mockResolvedValue(null)

    await expect(generateResponse(user, 'Hello', 'missing-session')).rejects.toMatchObject({
      status: 404,
      message: 'Chat session not found.'
    })
    expect(insertMessage).not.toHaveBeenCalled()
  })
})
