import { createInterface } from 'node:readline'
import { Command } from 'commander'
import { respond } from '../core/conversation.js'
import type { EngineContext } from '../core/types.js'
import { sentenceText, sentenceTaggedText } from '../extension/brain/sentence.js'
import { HttpPlugin } from '../plugins/http.js'
import { createContext } from './context.js'

export interface ChatIO {
  /** User input, one line at a time; the session ends when it does. */
  lines: AsyncIterable<string>
  print(text: string): void
  prompt(): void
}

/**
 * Run one chat session. Ends on `exit`, `quit` or the end of input, and
 * saves the brain either way.
 */
export async function runChat(ctx: EngineContext, io: ChatIO, opts: { debug: boolean }): Promise<void> {
  const opener = ctx.brain.makeQuestion()
  io.print(opener.length > 0 ? `hello! ${sentenceText(opener)}` : 'hello!')

  try {
    io.prompt()
    for await (const line of io.lines) {
      const input = line.trim()
      if (input === 'exit' || input === 'quit') {
        io.print('bye!')
        break
      }
      if (input !== '') {
        const { understood, reply } = respond(ctx.brain, input, ctx.config.chat)
        if (opts.debug) {
          io.print("Here's how I understood your message:")
          for (const s of understood) io.print(`- ${sentenceTaggedText(s)}`)
          io.print('')
        }

        if (reply.length === 0) {
          io.print('i am speechless :(')
        } else if (opts.debug) {
          io.print(`My response:\n- ${sentenceTaggedText(reply)}`)
        } else {
          io.print(sentenceText(reply))
        }
      }
      io.prompt()
    }
  } finally {
    await ctx.store.save(ctx.brain)
  }
}

export const chatCommand = new Command('chat')
  .description('Talk with the brain; everything you type is learned')
  .option('--debug', 'show how each message was tagged', false)
  .action(async (opts: { debug: boolean }, cmd: Command) => {
    const ctx = await createContext(cmd)
    // http.json can ask for the HTTP surface to run alongside the chat.
    const http = ctx.config.http.enabled ? new HttpPlugin() : null
    if (http) await http.start(ctx)

    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' })
    try {
      await runChat(ctx, { lines: rl, print: (text) => console.log(text), prompt: () => rl.prompt() }, opts)
    } finally {
      rl.close()
      if (http) await http.stop()
    }
  })
