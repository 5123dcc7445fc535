import { type Word, wordKey, wordsEqual } from './word.js'

/** Number of words in every chain. Snapshots record it and refuse to load any other. */
export const CHAIN_LEN = 4

/** A fixed-length window of consecutive words from some learned sentence. */
export type Chain = readonly [Word, Word, Word, Word]

export function makeChain(words: readonly Word[]): Chain {
  if (words.length !== CHAIN_LEN) {
    throw new RangeError(`chain needs ${CHAIN_LEN} words, got ${words.length}`)
  }
  return [words[0], words[1], words[2], words[3]]
}

export function chainKey(c: Chain): string {
  return c.map(wordKey).join('\u0001')
}

export function chainsEqual(a: Chain, b: Chain): boolean {
  return a.every((w, i) => wordsEqual(w, b[i]))
}

export function firstWord(c: Chain): Word {
  return c[0]
}

export function lastWord(c: Chain): Word {
  return c[CHAIN_LEN - 1]
}

/**
 * Slide the window one word earlier: every word moves one position toward
 * the end, the last is dropped and `word` takes the first position.
 */
export function shiftLeft(c: Chain, word: Word): Chain {
  return [word, c[0], c[1], c[2]]
}

/**
 * Slide the window one word later: every word moves one position toward
 * the start, the first is dropped and `word` takes the last position.
 */
export function shiftRight(c: Chain, word: Word): Chain {
  return [c[1], c[2], c[3], word]
}
