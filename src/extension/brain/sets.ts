/**
 * Value-keyed sets over words and chains.
 *
 * JS Sets compare objects by identity, so these keep a Map from each
 * element's value key to the element. Random selection indexes into a
 * materialized array of the members rather than relying on iteration order.
 */

import { type Word, wordKey, isNoun, isProperNoun } from './word.js'
import { type Chain, chainKey } from './chain.js'
import { BrainInvariantError } from './errors.js'
import { type RandomSource, defaultRandom, randomInt } from './random.js'

abstract class KeyedSet<T> implements Iterable<T> {
  protected items = new Map<string, T>()

  protected abstract keyOf(item: T): string

  get size(): number {
    return this.items.size
  }

  has(item: T): boolean {
    return this.items.has(this.keyOf(item))
  }

  add(item: T): this {
    const key = this.keyOf(item)
    if (!this.items.has(key)) this.items.set(key, item)
    return this
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items.values()
  }

  toArray(): T[] {
    return [...this.items.values()]
  }

  /** Pick one member uniformly. Throws on an empty set. */
  chooseOne(random: RandomSource = defaultRandom): T {
    const members = this.toArray()
    if (members.length === 0) {
      throw new BrainInvariantError(`chooseOne on empty ${this.constructor.name}`)
    }
    return members[randomInt(random, members.length)]
  }

  /**
   * Pick up to `n` distinct members uniformly, without replacement. Returns
   * fewer than `n` when the set is smaller.
   */
  chooseMany(n: number, random: RandomSource = defaultRandom): T[] {
    const members = this.toArray()
    const count = Math.min(Math.max(n, 0), members.length)
    // Partial Fisher-Yates: the first `count` slots end up as the sample.
    for (let i = 0; i < count; i++) {
      const j = i + randomInt(random, members.length - i)
      const tmp = members[i]
      members[i] = members[j]
      members[j] = tmp
    }
    return members.slice(0, count)
  }
}

export class WordSet extends KeyedSet<Word> {
  constructor(words: Iterable<Word> = []) {
    super()
    for (const w of words) this.add(w)
  }

  protected keyOf(w: Word): string {
    return wordKey(w)
  }

  /** New set holding the members of this set and every other given set. */
  union(...others: WordSet[]): WordSet {
    const ret = new WordSet(this)
    for (const other of others) {
      for (const w of other) ret.add(w)
    }
    return ret
  }

  nouns(): WordSet {
    return new WordSet(this.toArray().filter(isNoun))
  }

  properNouns(): WordSet {
    return new WordSet(this.toArray().filter(isProperNoun))
  }
}

export class ChainSet extends KeyedSet<Chain> {
  constructor(chains: Iterable<Chain> = []) {
    super()
    for (const c of chains) this.add(c)
  }

  protected keyOf(c: Chain): string {
    return chainKey(c)
  }

  union(...others: ChainSet[]): ChainSet {
    const ret = new ChainSet(this)
    for (const other of others) {
      for (const c of other) ret.add(c)
    }
    return ret
  }
}
