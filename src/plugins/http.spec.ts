import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createHttpApp } from './http.js'
import { Brain } from '../extension/brain/Brain.js'
import { makeWord, QUESTION_MARK } from '../extension/brain/word.js'
import { BrainStore } from '../core/brain-store.js'
import { silentLogger } from '../core/logger.js'
import type { Config, EngineContext } from '../core/types.js'

// Routes are exercised through Hono's in-process request helper; no socket is opened.

let tempDir: string

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'http-test-'))
})

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true })
})

function makeContext(brain = new Brain()): EngineContext {
  const config: Config = {
    brain: { file: join(tempDir, 'test.brain'), continueChance: 128, maxWords: null },
    http: { enabled: true, port: 0 },
    chat: { trimPeriod: true, learn: true },
    logging: { level: 'silent', file: join(tempDir, 'test.log') },
  }
  return {
    config,
    brain,
    store: new BrainStore(config.brain.file),
    logger: silentLogger(),
  }
}

function questionBrain(): Brain {
  const brain = new Brain()
  brain.addSentence([
    makeWord('VBP', 'do'), makeWord('PRP', 'you'), makeWord('VB', 'like'), makeWord('NNS', 'cats'), QUESTION_MARK,
  ])
  return brain
}

const postJson = (body: unknown) => ({
  method: 'POST',
  headers: { 'Content-Type': 'application/json' },
  body: typeof body === 'string' ? body : JSON.stringify(body),
})

describe('HTTP routes', () => {
  it('GET /health returns ok', async () => {
    const res = await createHttpApp(makeContext()).request('/health')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
  })

  it('GET /stats reports the brain size', async () => {
    const res = await createHttpApp(makeContext(questionBrain())).request('/stats')
    expect(await res.json()).toEqual({ chains: 2, words: 5, startChains: 1, endChains: 1 })
  })

  it('POST /reply answers and learns the turn', async () => {
    const ctx = makeContext(questionBrain())
    const res = await createHttpApp(ctx).request('/reply', postJson({ text: 'the weather is nice today.' }))
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      reply: 'do you like cats?',
      tagged: 'do/VBP you/PRP like/VB cats/NNS ?/.',
    })
    expect(ctx.brain.stats().chains).toBe(4)
  })

  it('POST /reply returns nulls when the brain has nothing to say', async () => {
    const res = await createHttpApp(makeContext()).request('/reply', postJson({ text: 'hello' }))
    expect(await res.json()).toEqual({ reply: null, tagged: null })
  })

  it('POST /reply rejects a body without text', async () => {
    const app = createHttpApp(makeContext())
    for (const body of [{ message: 'hi' }, { text: '' }, 'not json']) {
      const res = await app.request('/reply', postJson(body))
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'expected JSON body { text: string }' })
    }
  })

  it('POST /learn adds every sentence', async () => {
    const ctx = makeContext()
    const res = await createHttpApp(ctx).request(
      '/learn',
      postJson({ text: 'the cat sat on the mat. the dog sat on the rug.' }),
    )
    expect(await res.json()).toEqual({ learned: 2 })
    expect(ctx.brain.stats().chains).toBe(6)
  })

  it('GET /question returns null from an empty brain', async () => {
    const res = await createHttpApp(makeContext()).request('/question')
    expect(await res.json()).toEqual({ question: null })
  })

  it('GET /question asks a learned question', async () => {
    const res = await createHttpApp(makeContext(questionBrain())).request('/question')
    expect(await res.json()).toEqual({ question: 'do you like cats?' })
  })

  it('POST /save writes the snapshot', async () => {
    const ctx = makeContext(questionBrain())
    const res = await createHttpApp(ctx).request('/save', { method: 'POST' })
    expect(await res.json()).toEqual({ ok: true, path: ctx.store.path })
    expect((await stat(ctx.store.path)).size).toBeGreaterThan(4)
  })
})

describe('CORS', () => {
  it('should allow any origin', async () => {
    const res = await createHttpApp(makeContext()).request('/health', { headers: { Origin: 'http://localhost:5173' } })
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*')
  })
})
