import { type Word, type WordPair, PERIOD, isNoun, isProperNoun, wordsEqual, wordToPair, wordFromPair } from './word.js'
import { WordSet } from './sets.js'

/** An ordered run of words. The empty sentence means "nothing to say". */
export type Sentence = readonly Word[]

export function makeSentence(pairs: readonly WordPair[]): Sentence {
  return pairs.map(wordFromPair)
}

export function sentenceWords(s: Sentence): WordSet {
  return new WordSet(s)
}

/** Distinct nouns, proper nouns included. */
export function sentenceNouns(s: Sentence): WordSet {
  return new WordSet(s.filter(isNoun))
}

export function sentenceProperNouns(s: Sentence): WordSet {
  return new WordSet(s.filter(isProperNoun))
}

/**
 * Drop one trailing period, mimicking chat style where the final period is
 * usually left off. Two trailing periods are taken as an ellipsis and kept.
 * Other terminal punctuation is never trimmed.
 */
export function trimPeriod(s: Sentence): Sentence {
  const n = s.length
  if (n === 0 || !wordsEqual(s[n - 1], PERIOD)) return s
  if (n > 1 && wordsEqual(s[n - 2], PERIOD)) return s
  return s.slice(0, n - 1)
}

const NO_SPACE_BEFORE_TAGS = new Set(['.', ',', ':', ')', "''"])
const NO_SPACE_AFTER_TAGS = new Set(['(', '``', '$'])

/** Render a sentence as prose, gluing punctuation to its neighbours. */
export function sentenceText(s: Sentence): string {
  let ret = ''
  s.forEach((w, i) => {
    if (i > 0) {
      const prev = s[i - 1]
      const glued =
        NO_SPACE_BEFORE_TAGS.has(w.tag) ||
        NO_SPACE_AFTER_TAGS.has(prev.tag) ||
        w.text.includes("'")
      if (!glued) ret += ' '
    }
    ret += w.text
  })
  return ret
}

/** `word/TAG` notation, for debugging the tagger. */
export function sentenceTaggedText(s: Sentence): string {
  return s.map((w) => `${w.text}/${w.tag}`).join(' ')
}

export function sentenceToPairs(s: Sentence): WordPair[] {
  return s.map(wordToPair)
}
