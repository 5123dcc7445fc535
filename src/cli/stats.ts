import { Command } from 'commander'
import { createContext } from './context.js'

export const statsCommand = new Command('stats')
  .description('Show how much the brain knows')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (opts: { output: string }, cmd: Command) => {
    const ctx = await createContext(cmd)
    const stats = ctx.brain.stats()

    if (opts.output === 'json') {
      console.log(JSON.stringify(stats, null, 2))
      return
    }
    console.log(`Brain file:   ${ctx.store.path}`)
    console.log(`Chains:       ${stats.chains}`)
    console.log(`Words:        ${stats.words}`)
    console.log(`Start chains: ${stats.startChains}`)
    console.log(`End chains:   ${stats.endChains}`)
  })
