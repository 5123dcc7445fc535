import type { Command } from 'commander'
import { loadConfig } from '../core/config.js'
import { createLogger } from '../core/logger.js'
import { BrainStore } from '../core/brain-store.js'
import type { EngineContext } from '../core/types.js'

export interface GlobalOptions {
  brain?: string
  config: string
}

/** Load config, open the brain, and wire the shared context for a command. */
export async function createContext(cmd: Command): Promise<EngineContext> {
  const globals = cmd.optsWithGlobals<GlobalOptions>()
  const config = await loadConfig(globals.config)
  if (globals.brain) config.brain.file = globals.brain

  const logger = createLogger(config.logging)
  const store = new BrainStore(
    config.brain.file,
    {
      continueChance: config.brain.continueChance,
      maxWords: config.brain.maxWords,
      logger: logger.child({ component: 'brain' }),
    },
    logger.child({ component: 'store' }),
  )
  const brain = await store.open()
  return { config, brain, store, logger }
}
