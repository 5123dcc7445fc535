import { z } from 'zod'
import { readFile } from 'fs/promises'
import { resolve } from 'path'

export const DEFAULT_CONFIG_DIR = 'data/config'

// ==================== Individual Schemas ====================

const brainSchema = z.object({
  file: z.string().default('data/brain/ramble.brain'),
  continueChance: z.number().int().min(0).max(256).default(128),
  maxWords: z.number().int().positive().nullable().default(null),
})

const httpSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().positive().default(3000),
})

const chatSchema = z.object({
  trimPeriod: z.boolean().default(true),
  learn: z.boolean().default(true),
})

const loggingSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  file: z.string().default('logs/ramble.log'),
})

// ==================== Unified Config Type ====================

export type Config = {
  brain: z.infer<typeof brainSchema>
  http: z.infer<typeof httpSchema>
  chat: z.infer<typeof chatSchema>
  logging: z.infer<typeof loggingSchema>
}

// ==================== Loader ====================

async function loadJsonFile(dir: string, filename: string): Promise<unknown> {
  try {
    const raw = await readFile(resolve(dir, filename), 'utf-8')
    return JSON.parse(raw)
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {} // File not found → use defaults from Zod schema
    }
    throw err
  }
}

export async function loadConfig(dir = DEFAULT_CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const [brainRaw, httpRaw, chatRaw, loggingRaw] = await Promise.all([
    loadJsonFile(dir, 'brain.json'),
    loadJsonFile(dir, 'http.json'),
    loadJsonFile(dir, 'chat.json'),
    loadJsonFile(dir, 'logging.json'),
  ])

  const logging = loggingSchema.parse(loggingRaw)
  if (env.LOG_LEVEL) {
    logging.level = loggingSchema.shape.level.parse(env.LOG_LEVEL)
  }

  return {
    brain: brainSchema.parse(brainRaw),
    http: httpSchema.parse(httpRaw),
    chat: chatSchema.parse(chatRaw),
    logging,
  }
}
