import type { Logger } from 'pino'
import type { Brain } from '../extension/brain/Brain.js'
import type { BrainStore } from './brain-store.js'
import type { Config } from './config.js'

export type { Config }

export interface Plugin {
  name: string
  start(ctx: EngineContext): Promise<void>
  stop(): Promise<void>
}

export interface EngineContext {
  config: Config
  brain: Brain
  store: BrainStore
  logger: Logger
}
