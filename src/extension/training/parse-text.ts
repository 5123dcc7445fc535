/**
 * Free text → tagged sentences.
 *
 * Tokenizing is done here; part-of-speech tags come from the `pos` tagger
 * (Penn Treebank tag set). Text is lower-cased before tagging: the tagger
 * would otherwise use capitalization to spot proper nouns, and casual chat
 * is rarely capitalized, so tagging stays consistent between training text
 * and conversation at the cost of seldom seeing proper nouns.
 */

import pos from 'pos'
import { type Word, makeWord } from '../brain/word.js'
import type { Sentence } from '../brain/sentence.js'

const tagger = new pos.Tagger()

// Words (with internal apostrophes, hashtags, mentions) or single symbols.
const TOKEN_RE = /[#@]?[\p{L}\p{N}_]+(?:['’][\p{L}\p{N}_]+)*|[^\s\p{L}\p{N}_]/gu

const CLITIC_RE = /^(.+?)(n['’]t|['’](?:s|re|ve|ll|d|m))$/u

const SENTENCE_END = new Set(['.', '?', '!'])
const CLOSING_QUOTES = new Set(['"', '”', "'", '’'])

/** Penn tags for symbols, which the tagger's lexicon covers unevenly. */
const SYMBOL_TAGS: Readonly<Record<string, string>> = {
  '.': '.',
  '?': '.',
  '!': '.',
  ',': ',',
  ':': ':',
  ';': ':',
  '-': ':',
  '–': ':',
  '—': ':',
  '(': '(',
  ')': ')',
  '[': '(',
  ']': ')',
  '$': '$',
  '#': '#',
}

const OPEN_QUOTE = '``'
const CLOSE_QUOTE = "''"

/** Split text into tokens, separating clitics the way the Penn tag set expects ("do" "n't"). */
export function tokenize(text: string): string[] {
  const tokens: string[] = []
  for (const [tok] of text.matchAll(TOKEN_RE)) {
    const clitic = CLITIC_RE.exec(tok)
    if (clitic) {
      tokens.push(clitic[1], clitic[2])
    } else {
      tokens.push(tok)
    }
  }
  return tokens
}

function tagTokens(tokens: string[]): Word[] {
  return tagger.tag(tokens).map(([text, tag]) => {
    if (Object.hasOwn(SYMBOL_TAGS, text)) return makeWord(SYMBOL_TAGS[text], text)
    if (text.startsWith('#') || text.startsWith('@')) return makeWord('NN', text)
    return makeWord(tag, text)
  })
}

/**
 * Cut a token stream after sentence-final punctuation. Runs of terminators
 * ("?!", "...") and a closing quote straight after them stay with the
 * sentence they end.
 */
function splitSentences(tokens: string[]): string[][] {
  const ret: string[][] = []
  let current: string[] = []
  tokens.forEach((tok, i) => {
    const prev = current[current.length - 1]
    current.push(tok)
    const ends = SENTENCE_END.has(tok) || (CLOSING_QUOTES.has(tok) && prev !== undefined && SENTENCE_END.has(prev))
    if (!ends) return
    const next = tokens[i + 1]
    if (next !== undefined && (SENTENCE_END.has(next) || CLOSING_QUOTES.has(next))) return
    ret.push(current)
    current = []
  })
  if (current.length > 0) ret.push(current)
  return ret
}

/**
 * Give every quote token an open or close tag. Straight quotes alternate;
 * curly quotes say which they are. Applies in place and returns the same
 * array.
 */
export function fixupQuotes(words: Word[]): Word[] {
  let doubleOpen = false
  let singleOpen = false

  words.forEach((w, i) => {
    let tag: string | null = null
    switch (w.text) {
      case '"':
        tag = doubleOpen ? CLOSE_QUOTE : OPEN_QUOTE
        doubleOpen = !doubleOpen
        break
      case "'":
        tag = singleOpen ? CLOSE_QUOTE : OPEN_QUOTE
        singleOpen = !singleOpen
        break
      case '“':
        tag = OPEN_QUOTE
        doubleOpen = true
        break
      case '”':
        tag = CLOSE_QUOTE
        doubleOpen = false
        break
      case '‘':
        tag = OPEN_QUOTE
        singleOpen = true
        break
      case '’':
        tag = CLOSE_QUOTE
        singleOpen = false
        break
    }
    if (tag !== null && tag !== w.tag) words[i] = makeWord(tag, w.text)
  })
  return words
}

export function parseText(text: string): Sentence[] {
  const tokens = tokenize(text.toLowerCase())
  return splitSentences(tokens).map((sentence) => fixupQuotes(tagTokens(sentence)))
}
