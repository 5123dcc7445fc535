/**
 * Brain: the chain index a chatbot learns from and talks with.
 *
 * Learning slides a CHAIN_LEN-word window over each sentence and records,
 * for every window ("chain"), which words were seen just before and just
 * after it, and whether it opened or closed the sentence. Generation picks
 * a chain containing a keyword and random-walks outwards in both directions
 * until it reaches chains that are allowed to start and end a sentence.
 *
 * Every operation is synchronous, so on a single event loop each call sees
 * the index as a whole: a sentence is either fully learned or not at all
 * from the point of view of any generation.
 */

import type { Logger } from 'pino'
import { type Word, QUESTION_MARK, isProperNoun, wordKey, wordsEqual } from './word.js'
import { type Chain, CHAIN_LEN, makeChain, chainKey, firstWord, lastWord, shiftLeft, shiftRight } from './chain.js'
import { WordSet, ChainSet } from './sets.js'
import { type Sentence, sentenceText, sentenceWords, sentenceNouns, sentenceProperNouns } from './sentence.js'
import { type RandomSource, defaultRandom, randomInt } from './random.js'
import { BrainInvariantError } from './errors.js'

/** Default odds, out of 256, of walking past a chain that could legally end the walk. */
export const DEFAULT_CONTINUE_CHANCE = 128

// ==================== Types ====================

export interface BrainOptions {
  /** Source for every random choice (default Math.random). */
  random?: RandomSource
  /** Out of 256. 0 always stops at the first legal boundary, 256 never does while words remain. */
  continueChance?: number
  /**
   * Once a walk has this many words, stop at the next legal boundary instead
   * of rolling to continue. Unset means walks are bounded only by chance.
   */
  maxWords?: number | null
  logger?: Logger
}

export interface BrainStats {
  chains: number
  words: number
  startChains: number
  endChains: number
}

/**
 * Flat view of one chain and its adjacency, as read by the snapshot codec.
 * `wordsBefore` / `wordsAfter` are empty when nothing was recorded.
 */
export interface ChainRecord {
  chain: Chain
  wordsBefore: readonly Word[]
  wordsAfter: readonly Word[]
  canStart: boolean
  canEnd: boolean
}

// ==================== Brain ====================

export class Brain {
  /** Every chain ever learned. */
  private chains = new ChainSet()
  /** Word key → chains containing that word at any position. */
  private wordChains = new Map<string, ChainSet>()
  /** Chain key → words seen immediately before / after that chain. */
  private wordsBefore = new Map<string, WordSet>()
  private wordsAfter = new Map<string, WordSet>()
  private startChains = new ChainSet()
  private endChains = new ChainSet()

  private random: RandomSource
  private continueChance: number
  private maxWords: number | null
  private logger?: Logger

  constructor(options: BrainOptions = {}) {
    this.random = options.random ?? defaultRandom
    this.continueChance = options.continueChance ?? DEFAULT_CONTINUE_CHANCE
    this.maxWords = options.maxWords ?? null
    this.logger = options.logger
  }

  // ==================== Learning ====================

  /**
   * Learn every CHAIN_LEN-word window of the sentence. Sentences shorter
   * than one chain are ignored.
   */
  addSentence(s: Sentence): void {
    if (s.length < CHAIN_LEN) return

    const windows = s.length - (CHAIN_LEN - 1)
    for (let i = 0; i < windows; i++) {
      const chain = makeChain(s.slice(i, i + CHAIN_LEN))
      this.indexChain(chain)

      if (i === 0) {
        this.startChains.add(chain)
      } else {
        this.recordAdjacent(this.wordsBefore, chain, s[i - 1])
      }

      if (i === windows - 1) {
        this.endChains.add(chain)
      } else {
        this.recordAdjacent(this.wordsAfter, chain, s[i + CHAIN_LEN])
      }
    }
  }

  addSentences(ss: Iterable<Sentence>): void {
    for (const s of ss) this.addSentence(s)
  }

  /**
   * Re-create one chain and its adjacency exactly as recorded. Used when
   * rebuilding a brain from a snapshot.
   */
  restoreChain(record: ChainRecord): void {
    const { chain } = record
    this.indexChain(chain)
    const key = chainKey(chain)
    if (!this.wordsBefore.has(key)) this.wordsBefore.set(key, new WordSet())
    if (!this.wordsAfter.has(key)) this.wordsAfter.set(key, new WordSet())
    for (const w of record.wordsBefore) this.recordAdjacent(this.wordsBefore, chain, w)
    for (const w of record.wordsAfter) this.recordAdjacent(this.wordsAfter, chain, w)
    if (record.canStart) this.startChains.add(chain)
    if (record.canEnd) this.endChains.add(chain)
  }

  // ==================== Generation ====================

  /** A sentence containing `w` anywhere, or empty if `w` is unknown. */
  makeSentenceWithKeyword(w: Word): Sentence {
    return this.makeSentence(w, false, false)
  }

  /** A sentence that begins with `w`, or empty if no learned sentence did. */
  makeSentenceStartingKeyword(w: Word): Sentence {
    return this.makeSentence(w, true, false)
  }

  /**
   * A random question: a sentence ending in a question mark. Empty until the
   * brain has learned at least one such sentence.
   */
  makeQuestion(): Sentence {
    this.logger?.debug('building a question sentence')
    return this.makeSentence(QUESTION_MARK, false, true)
  }

  /**
   * A sentence to answer "why" with. The caller decides what counts as a
   * reason; here it is any learned sentence opening with the question-mark
   * word.
   */
  makeReason(): Sentence {
    this.logger?.debug('building a reason sentence')
    return this.makeSentence(QUESTION_MARK, true, false)
  }

  /**
   * Build candidate sentences from the keywords of the given input and
   * return the one sharing the most with it. Empty when the input has no
   * nouns or the brain knows none of them.
   */
  makeReply(...input: Sentence[]): Sentence {
    let allWords = new WordSet()
    let nouns = new WordSet()
    let properNouns = new WordSet()
    for (const s of input) {
      allWords = allWords.union(sentenceWords(s))
      nouns = nouns.union(sentenceNouns(s))
      properNouns = properNouns.union(sentenceProperNouns(s))
    }

    // A lone proper noun would make every reply about the same thing, so
    // nouns join in; proper nouns still win on score.
    const keywords = properNouns.size >= 2 ? properNouns : nouns
    if (keywords.size === 0) return []

    this.logger?.debug({ keywords: keywords.toArray().map((w) => w.text) }, 'building replies')

    const candidates: Sentence[] = []
    for (const keyword of keywords) {
      const s = this.makeSentenceWithKeyword(keyword)
      if (s.length > 0) candidates.push(s)
    }

    if (candidates.length === 0) {
      this.logger?.debug('no sentences were generated')
      return []
    }
    if (candidates.length === 1) return candidates[0]

    let best: Sentence = []
    let bestScore = -1
    for (const s of candidates) {
      const score = scoreReply(s, allWords, nouns, properNouns)
      this.logger?.debug({ sentence: sentenceText(s), score }, 'scored reply candidate')
      if (score > bestScore) {
        bestScore = score
        best = s
      }
    }
    return best
  }

  // ==================== Inspection ====================

  stats(): BrainStats {
    return {
      chains: this.chains.size,
      words: this.wordChains.size,
      startChains: this.startChains.size,
      endChains: this.endChains.size,
    }
  }

  knowsWord(w: Word): boolean {
    return (this.wordChains.get(wordKey(w))?.size ?? 0) > 0
  }

  /** Every chain with its adjacency, in learning order. */
  *chainRecords(): Generator<ChainRecord> {
    for (const chain of this.chains) {
      const key = chainKey(chain)
      yield {
        chain,
        wordsBefore: this.wordsBefore.get(key)?.toArray() ?? [],
        wordsAfter: this.wordsAfter.get(key)?.toArray() ?? [],
        canStart: this.startChains.has(chain),
        canEnd: this.endChains.has(chain),
      }
    }
  }

  chainsContaining(w: Word): Chain[] {
    return this.wordChains.get(wordKey(w))?.toArray() ?? []
  }

  // ==================== Internal ====================

  private indexChain(chain: Chain): void {
    this.chains.add(chain)
    for (const w of chain) {
      const key = wordKey(w)
      let set = this.wordChains.get(key)
      if (!set) {
        set = new ChainSet()
        this.wordChains.set(key, set)
      }
      set.add(chain)
    }
  }

  private recordAdjacent(index: Map<string, WordSet>, chain: Chain, w: Word): void {
    const key = chainKey(chain)
    let set = index.get(key)
    if (!set) {
      set = new WordSet()
      index.set(key, set)
    }
    set.add(w)
  }

  private makeSentence(w: Word, mustBeStart: boolean, mustBeEnd: boolean): Sentence {
    this.logger?.debug({ keyword: w.text, mustBeStart, mustBeEnd }, 'building a sentence')

    const chains = this.wordChains.get(wordKey(w))
    if (!chains || chains.size === 0) return []

    const seed = this.chooseSeed(chains, w, mustBeStart, mustBeEnd)
    if (!seed) {
      this.logger?.debug({ keyword: w.text }, 'no chain satisfies the position constraint')
      return []
    }
    this.logger?.debug({ seed: seed.map((x) => x.text) }, 'seed chain chosen')

    const before = this.walk(seed, this.startChains, this.wordsBefore, shiftLeft, CHAIN_LEN)
    const after = this.walk(seed, this.endChains, this.wordsAfter, shiftRight, CHAIN_LEN + before.length)
    this.logger?.debug({ before: before.map((x) => x.text), after: after.map((x) => x.text) }, 'walk finished')

    return [...before.reverse(), ...seed, ...after]
  }

  private chooseSeed(chains: ChainSet, w: Word, mustBeStart: boolean, mustBeEnd: boolean): Chain | null {
    if (mustBeEnd) {
      for (const c of chains) {
        if (wordsEqual(lastWord(c), w) && this.endChains.has(c)) return c
      }
      return null
    }
    if (mustBeStart) {
      for (const c of chains) {
        if (wordsEqual(firstWord(c), w) && this.startChains.has(c)) return c
      }
      return null
    }
    return chains.chooseOne(this.random)
  }

  /**
   * Extend outwards from `seed` one word at a time. Returns the added words
   * nearest-first. `length` is the sentence length before this walk, for
   * the maxWords cap.
   */
  private walk(
    seed: Chain,
    boundary: ChainSet,
    adjacent: Map<string, WordSet>,
    shift: (c: Chain, w: Word) => Chain,
    length: number,
  ): Word[] {
    const added: Word[] = []
    let current = seed
    for (;;) {
      const next = adjacent.get(chainKey(current))
      if (boundary.has(current)) {
        if (!next || next.size === 0) break
        if (!this.rollContinue(length + added.length)) break
      } else if (!next || next.size === 0) {
        throw new BrainInvariantError(
          `chain ${JSON.stringify(current.map((x) => x.text))} is not a boundary but has no neighbouring words`,
        )
      }

      const w = next.chooseOne(this.random)
      added.push(w)
      current = shift(current, w)
    }
    return added
  }

  private rollContinue(length: number): boolean {
    if (this.maxWords !== null && length >= this.maxWords) return false
    return randomInt(this.random, 256) < this.continueChance
  }
}

// ==================== Scoring ====================

/**
 * Relevance of a candidate reply to the input it answers. Proper nouns earn
 * 2, input nouns 3, input proper nouns another 4, and any input word 1, so a
 * proper noun repeated from the input is worth 10.
 */
export function scoreReply(s: Sentence, allWords: WordSet, nouns: WordSet, properNouns: WordSet): number {
  let score = 0
  for (const w of s) {
    if (isProperNoun(w)) score += 2
    if (nouns.has(w)) score += 3
    if (properNouns.has(w)) score += 4
    if (allWords.has(w)) score += 1
  }
  return score
}
