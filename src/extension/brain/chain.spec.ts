import { describe, it, expect } from 'vitest'
import { makeWord } from './word.js'
import { makeChain, chainKey, chainsEqual, shiftLeft, shiftRight, firstWord, lastWord } from './chain.js'

const w = (text: string) => makeWord('NN', text)

describe('makeChain', () => {
  it('should take exactly four words', () => {
    const c = makeChain([w('a'), w('b'), w('c'), w('d')])
    expect(c.map((x) => x.text)).toEqual(['a', 'b', 'c', 'd'])
    expect(firstWord(c).text).toBe('a')
    expect(lastWord(c).text).toBe('d')
  })

  it('should reject any other length', () => {
    expect(() => makeChain([w('a'), w('b'), w('c')])).toThrow(RangeError)
    expect(() => makeChain([w('a'), w('b'), w('c'), w('d'), w('e')])).toThrow('chain needs 4 words, got 5')
  })
})

describe('chain identity', () => {
  it('should compare by value', () => {
    const a = makeChain([w('a'), w('b'), w('c'), w('d')])
    const b = makeChain([w('a'), w('b'), w('c'), w('d')])
    expect(a).not.toBe(b)
    expect(chainsEqual(a, b)).toBe(true)
    expect(chainKey(a)).toBe(chainKey(b))
  })

  it('should depend on order', () => {
    const a = makeChain([w('a'), w('b'), w('c'), w('d')])
    const b = makeChain([w('d'), w('c'), w('b'), w('a')])
    expect(chainsEqual(a, b)).toBe(false)
    expect(chainKey(a)).not.toBe(chainKey(b))
  })
})

describe('shifts', () => {
  const c = makeChain([w('a'), w('b'), w('c'), w('d')])

  it('shiftLeft should put the new word first and drop the last', () => {
    expect(shiftLeft(c, w('x')).map((x) => x.text)).toEqual(['x', 'a', 'b', 'c'])
  })

  it('shiftRight should put the new word last and drop the first', () => {
    expect(shiftRight(c, w('x')).map((x) => x.text)).toEqual(['b', 'c', 'd', 'x'])
  })

  it('should leave the original chain untouched', () => {
    shiftLeft(c, w('x'))
    shiftRight(c, w('y'))
    expect(c.map((x) => x.text)).toEqual(['a', 'b', 'c', 'd'])
  })
})
