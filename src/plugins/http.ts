import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { serve } from '@hono/node-server'
import { z } from 'zod'
import type { Plugin, EngineContext } from '../core/types.js'
import { respond } from '../core/conversation.js'
import { parseText } from '../extension/training/parse-text.js'
import { sentenceText, sentenceTaggedText, trimPeriod } from '../extension/brain/sentence.js'

const textBodySchema = z.object({
  text: z.string().min(1),
})

export function createHttpApp(ctx: EngineContext) {
  const app = new Hono()
  const log = ctx.logger.child({ component: 'http' })

  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }))

  const readText = async (req: { json(): Promise<unknown> }) => {
    let raw: unknown = null
    try {
      raw = await req.json()
    } catch {
      return null // not JSON
    }
    const parsed = textBodySchema.safeParse(raw)
    return parsed.success ? parsed.data.text : null
  }

  app.get('/health', (c) => c.json({ ok: true }))

  app.get('/stats', (c) => c.json(ctx.brain.stats()))

  app.post('/reply', async (c) => {
    const text = await readText(c.req)
    if (text === null) return c.json({ error: 'expected JSON body { text: string }' }, 400)

    const { reply } = respond(ctx.brain, text, ctx.config.chat)
    log.debug({ text, reply: sentenceText(reply) }, 'reply')
    return c.json({
      reply: reply.length > 0 ? sentenceText(reply) : null,
      tagged: reply.length > 0 ? sentenceTaggedText(reply) : null,
    })
  })

  app.post('/learn', async (c) => {
    const text = await readText(c.req)
    if (text === null) return c.json({ error: 'expected JSON body { text: string }' }, 400)

    const sentences = parseText(text)
    ctx.brain.addSentences(ctx.config.chat.trimPeriod ? sentences.map(trimPeriod) : sentences)
    return c.json({ learned: sentences.length })
  })

  app.get('/question', (c) => {
    const question = ctx.brain.makeQuestion()
    return c.json({ question: question.length > 0 ? sentenceText(question) : null })
  })

  app.post('/save', async (c) => {
    await ctx.store.save(ctx.brain)
    return c.json({ ok: true, path: ctx.store.path })
  })

  return app
}

export class HttpPlugin implements Plugin {
  name = 'http'
  private server: ReturnType<typeof serve> | null = null
  private ctx: EngineContext | null = null

  async start(ctx: EngineContext) {
    this.ctx = ctx
    const app = createHttpApp(ctx)
    this.server = serve({ fetch: app.fetch, port: ctx.config.http.port }, (info) => {
      ctx.logger.info({ port: info.port }, 'http plugin listening')
      console.log(`http plugin listening on http://localhost:${info.port}`)
    })
  }

  async stop() {
    this.server?.close()
    this.server = null
    if (this.ctx) await this.ctx.store.save(this.ctx.brain)
  }
}
