import type { Server } from 'node:http'
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../app.js'
import { HttpError } from '../errors.js'
import type { User } from '../repos/userRepo.js'
import { login } from '../services/auth/accounts.js'

vi.mock('../services/auth/accounts.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../services/auth/accounts.js')>()),
  login: vi.fn()
}))

const NOW = new Date('2026-03-10T12:00:00Z')

const clinician: User = {
  id: 3,
  email: 'lee@example.com',
  passwordHash: 'hashed',
  firstName: 'Lee',
  lastName: 'Park',
  dateOfBirth: null,
  gender: null,
  phoneNumber: '',
  numericalIdentifier: null,
  role: 'clinician',
  language: 'en',
  assignedDoctorId: null,
  specialtyName: 'Oncology',
  isActive: true,
  isEmailVerified: true,
  dateJoined: NOW,
  lastLogin: NOW
}

let server: Server
let baseUrl: string

beforeAll(async () => {
  server = createApp().listen(0)
  await new Promise<void>((resolve) => server.once('listening', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('Expected a TCP address')
  baseUrl = `http://127.0.0.1:${address.port}/api/v1/auth`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
})

beforeEach(() => {
  vi.clearAllMocks()
})

function postJson(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body)
  })
}

describe('POST /login', () => {
  it('rejects a username that is not an email without checking credentials', async () => {
    const res = await postJson('/login', { username: 'lee', password: 'pw' })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Please enter a correct email and password.' })
    expect(login).not.toHaveBeenCalled()
  })

  it('sets the access cookie and returns the dashboard redirect', async () => {
    vi.mocked(login).mockResolvedValue({
      user: clinician,
      token: 'signed-token',
      maxAgeMs: 24 * 60 * 60 * 1000,
      redirect: '/clinician'
    })

    const res = await postJson('/login', { username: ' Lee@Example.com ', password: 'pw' })

    expect(res.status).toBe(200)
    expect(res.headers.get('cache-control')).toBe('no-cache, no-store, must-revalidate')
    const cookie = res.headers.get('set-cookie') ?? ''
    expect(cookie.startsWith('access_token=signed-token;')).toBe(true)
    expect(cookie).toContain('Max-Age=86400')
    expect(cookie).toContain('HttpOnly')

    const body: unknown = await res.json()
    expect(body).toMatchObject({ status: 'success', token: 'signed-token', redirect: '/clinician', user: { id: 3 } })
    expect(vi.mocked(login).mock.calls[0]?.[0]).toMatchObject({
      email: 'lee@example.com',
      password: 'pw',
      rememberMe: false
    })
  })

  it('passes the lockout delay on as Retry-After', async () => {
    vi.mocked(login).mockRejectedValue(
      new HttpError(429, 'Too many failed login attempts. Please try again later.', { retryAfterSeconds: 1200 })
    )

    const res = await postJson('/login', { username: 'lee@example.com', password: 'wrong' })

    expect(res.status).toBe(429)
    expect(res.headers.get('retry-after')).toBe('1200')
    expect(await res.json()).toEqual({
      error: 'Too many failed login attempts. Please try again later.',
      retryAfterSeconds: 1200
    })
  })
})

describe('POST /logout', () => {
  it('clears the access cookie even without a session', async () => {
    const res = await postJson('/logout', {})

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'success' })
    expect(res.headers.get('set-cookie')?.startsWith('access_token=;')).toBe(true)
  })
})

describe('GET /redirect', () => {
  it('requires a signed-in user', async () => {
    const res = await fetch(`${baseUrl}/redirect`)
    expect(res.status).toBe(401)
  })
})
