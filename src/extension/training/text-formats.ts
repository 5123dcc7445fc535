import { z } from 'zod'
import { marked } from 'marked'
import { makeSentence, type Sentence } from '../brain/sentence.js'
import { parseText } from './parse-text.js'
import { parseHtml } from './html.js'

/** Blank lines separate paragraphs; line breaks inside one are just spaces. */
function paragraphs(text: string): string[] {
  return text
    .split(/\r?\n\s*\r?\n/)
    .map((p) => p.replace(/\s+/g, ' ').trim())
    .filter((p) => p !== '')
}

export function parsePlain(text: string): Sentence[] {
  return paragraphs(text).flatMap(parseText)
}

/**
 * Markdown is rendered to HTML and read like any other page, so code
 * blocks, tables and headings are left out the same way.
 */
export function parseMarkdown(text: string): Sentence[] {
  return parseHtml(marked.parse(text, { async: false }))
}

/** MegaHAL training files: one utterance per line, `#` starts a comment line. */
export function parseMegaHal(text: string): Sentence[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
    .flatMap(parseText)
}

const preTaggedSchema = z.array(z.array(z.tuple([z.string(), z.string()])))

/**
 * Sentences tagged ahead of time: a JSON array of sentences, each an array
 * of `[text, tag]` pairs. Skips the tagger entirely.
 */
export function parsePreTagged(text: string): Sentence[] {
  const parsed = preTaggedSchema.safeParse(JSON.parse(text))
  if (!parsed.success) {
    throw new Error(`pre-tagged JSON must be an array of [text, tag] sentences: ${parsed.error.message}`)
  }
  return parsed.data.map(makeSentence)
}
