#!/usr/bin/env node
import { Command } from 'commander'
import { DEFAULT_CONFIG_DIR } from './core/config.js'
import { trainCommand } from './cli/train.js'
import { chatCommand } from './cli/chat.js'
import { serveCommand } from './cli/serve.js'
import { statsCommand } from './cli/stats.js'

const program = new Command()

program
  .name('ramble')
  .description('Chatbot that learns four-word chains from text and rambles new sentences back')
  .version('0.1.0')
  .option('--brain <file>', 'brain snapshot to load and save (overrides brain.json)')
  .option('--config <dir>', 'directory holding the JSON config files', DEFAULT_CONFIG_DIR)

program.addCommand(trainCommand)
program.addCommand(chatCommand)
program.addCommand(serveCommand)
program.addCommand(statsCommand)

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err)
  process.exitCode = 1
})
