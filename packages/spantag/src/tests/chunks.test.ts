import { describe, test, expect } from 'vitest'
import { extractChunks, parseTag } from '../lib/chunks.js'

describe('parseTag', () => {
  test('prefix notation', () => {
    expect(parseTag('B-LOC')).toEqual({ role: 'B', type: 'LOC' })
    expect(parseTag('I-ORG-X')).toEqual({ role: 'I', type: 'ORG-X' })
    expect(parseTag('S-PER')).toEqual({ role: 'S', type: 'PER' })
  })

  test('suffix notation', () => {
    expect(parseTag('LOC-B', { suffix: true })).toEqual({ role: 'B', type: 'LOC' })
    expect(parseTag('ORG-X-E', { suffix: true })).toEqual({ role: 'E', type: 'ORG-X' })
  })

  test('outside, empty and unknown roles', () => {
    expect(parseTag('O')).toEqual({ role: 'O', type: '_' })
    expect(parseTag('')).toEqual({ role: 'O', type: '_' })
    expect(parseTag('[PAD]')).toEqual({ role: 'O', type: '_' })
    expect(parseTag('.')).toEqual({ role: 'O', type: '_' })
  })

  test('label without a type', () => {
    expect(parseTag('B')).toEqual({ role: 'B', type: '_' })
  })
})

describe('extractChunks', () => {
  test('BIO place names', () => {
    const chunks = extractChunks(['B-LOC', 'I-LOC', 'B-LOC', 'I-LOC', 'I-LOC'])
    expect(chunks).toEqual([
      { type: 'LOC', start: 0, end: 2 },
      { type: 'LOC', start: 2, end: 5 }
    ])
  })

  test('outside labels separate chunks and trailing chunk closes at the end', () => {
    const chunks = extractChunks(['O', 'B-PER', 'I-PER', 'O', 'B-ORG'])
    expect(chunks).toEqual([
      { type: 'PER', start: 1, end: 3 },
      { type: 'ORG', start: 4, end: 5 }
    ])
  })

  test('BIOES roles', () => {
    const chunks = extractChunks(['S-PER', 'B-LOC', 'I-LOC', 'E-LOC', 'O', 'S-ORG'])
    expect(chunks).toEqual([
      { type: 'PER', start: 0, end: 1 },
      { type: 'LOC', start: 1, end: 4 },
      { type: 'ORG', start: 5, end: 6 }
    ])
  })

  test('suffix notation', () => {
    const chunks = extractChunks(['LOC-B', 'LOC-I', 'O', 'PER-S'], { suffix: true })
    expect(chunks).toEqual([
      { type: 'LOC', start: 0, end: 2 },
      { type: 'PER', start: 3, end: 4 }
    ])
  })

  test('leading inside label opens its own chunk', () => {
    let chunks: ReturnType<typeof extractChunks> = []
    expect(() => { chunks = extractChunks(['I-PER', 'O', 'B-LOC']) }).not.toThrow()
    expect(chunks).toEqual([
      { type: 'PER', start: 0, end: 1 },
      { type: 'LOC', start: 2, end: 3 }
    ])
  })

  test('type change inside a run is an implied boundary', () => {
    const chunks = extractChunks(['B-PER', 'I-PER', 'I-LOC', 'I-LOC'])
    expect(chunks).toEqual([
      { type: 'PER', start: 0, end: 2 },
      { type: 'LOC', start: 2, end: 4 }
    ])
  })

  test('inside after end opens a new chunk', () => {
    const chunks = extractChunks(['B-LOC', 'E-LOC', 'I-LOC'])
    expect(chunks).toEqual([
      { type: 'LOC', start: 0, end: 2 },
      { type: 'LOC', start: 2, end: 3 }
    ])
  })

  test('empty and all-outside sequences yield no chunks', () => {
    expect(extractChunks([])).toEqual([])
    expect(extractChunks(['O', 'O', ''])).toEqual([])
  })

  test('unknown labels act as outside', () => {
    const chunks = extractChunks(['B-LOC', '[PAD]', 'I-LOC'])
    expect(chunks).toEqual([
      { type: 'LOC', start: 0, end: 1 },
      { type: 'LOC', start: 2, end: 3 }
    ])
  })

  test('chunks are ordered, non-overlapping and cover only tagged positions', () => {
    const roles = ['B', 'I', 'E', 'S', 'O']
    const types = ['PER', 'LOC']
    // deterministic pseudo-random label soup, malformed transitions included
    let seed = 7
    const next = () => {
      seed = (seed * 48271) % 2147483647
      return seed
    }

    for (let round = 0; round < 200; round++) {
      const length = next() % 12
      const tags = Array.from({ length }, () => {
        const role = roles[next() % roles.length] ?? 'O'
        return role === 'O' ? 'O' : `${role}-${types[next() % types.length] ?? 'PER'}`
      })

      const chunks = extractChunks(tags)
      let lastEnd = 0
      for (const c of chunks) {
        expect(c.start).toBeGreaterThanOrEqual(lastEnd)
        expect(c.end).toBeGreaterThan(c.start)
        expect(c.end).toBeLessThanOrEqual(tags.length)
        for (let t = c.start; t < c.end; t++) {
          expect(tags[t]).not.toBe('O')
          expect(tags[t]?.slice(2)).toBe(c.type)
        }
        lastEnd = c.end
      }

      expect(extractChunks(tags)).toEqual(chunks)
    }
  })
})
