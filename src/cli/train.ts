import { readFile } from 'node:fs/promises'
import { Command } from 'commander'
import { parseTrainingInput } from '../extension/training/format.js'
import { sentenceText, type Sentence } from '../extension/brain/sentence.js'
import { createContext } from './context.js'

const PREVIEW_SENTENCES = 5

export const trainCommand = new Command('train')
  .description('Learn sentences from HTML, feeds, Markdown, plain text, MegaHAL .trn or pre-tagged JSON files')
  .argument('<files...>', 'training files; format is chosen by extension')
  .action(async (files: string[], _opts: unknown, cmd: Command) => {
    const ctx = await createContext(cmd)
    const log = ctx.logger.child({ component: 'train' })

    for (const filename of files) {
      console.log(`Reading training content from ${filename}...`)
      let sentences: Sentence[]
      try {
        const bytes = await readFile(filename)
        sentences = parseTrainingInput(bytes, { filename })
      } catch (err) {
        console.error(`Failed to read ${filename}: ${err instanceof Error ? err.message : err}`)
        log.error({ err, filename }, 'training input failed')
        process.exitCode = 1
        return
      }

      console.log(`Sentences found: ${sentences.length}`)
      for (const s of sentences.slice(0, PREVIEW_SENTENCES)) console.log(`- ${sentenceText(s)}`)
      if (sentences.length > PREVIEW_SENTENCES) console.log('- (etc...)')

      ctx.brain.addSentences(sentences)
      log.info({ filename, sentences: sentences.length }, 'learned training file')

      // Saved per file; a failure on a later file keeps this one.
      await ctx.store.save(ctx.brain)
    }

    console.log(`All done! Updated brain saved in ${ctx.store.path}`)
  })
