import { describe, expect, it } from 'vitest'
import { splitText } from './chunk.js'

describe('splitText', () => {
  it('splits on paragraph breaks first', async () => {
    const chunks = await splitText('alpha beta\n\ngamma delta', { chunkSize: 20, chunkOverlap: 0 })
    expect(chunks).toEqual(['alpha beta', 'gamma delta'])
  })

  it('keeps every chunk within the size limit', async () => {
    const text = Array.from({ length: 60 }, (_, i) => `Sentence number ${i} about treatment options.`).join(' ')
    const chunks = await splitText(text, { chunkSize: 120, chunkOverlap: 20 })
    expect(chunks.length).toBeGreaterThan(1)
    for (const c of chunks) expect(c.length).toBeLessThanOrEqual(120)
  })

  it('returns a short text as a single trimmed chunk', async () => {
    expect(await splitText('  short note  ', { chunkSize: 100, chunkOverlap: 10 })).toEqual(['short note'])
  })
})
