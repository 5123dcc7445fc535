export { Brain, DEFAULT_CONTINUE_CHANCE, scoreReply } from './Brain.js'
export type { BrainOptions, BrainStats, ChainRecord } from './Brain.js'
export {
  makeWord,
  classifyTag,
  isNoun,
  isProperNoun,
  isHashtag,
  isAtMention,
  wordKey,
  wordsEqual,
  wordToPair,
  wordFromPair,
  PERIOD,
  QUESTION_MARK,
  EXCLAMATION_MARK,
  INVALID_WORD,
} from './word.js'
export type { Word, WordPair, TagCategory } from './word.js'
export { CHAIN_LEN, makeChain, chainKey, chainsEqual, shiftLeft, shiftRight } from './chain.js'
export type { Chain } from './chain.js'
export { WordSet, ChainSet } from './sets.js'
export {
  makeSentence,
  sentenceWords,
  sentenceNouns,
  sentenceProperNouns,
  sentenceText,
  sentenceTaggedText,
  sentenceToPairs,
  trimPeriod,
} from './sentence.js'
export type { Sentence } from './sentence.js'
export { defaultRandom, seededRandom, randomInt } from './random.js'
export type { RandomSource } from './random.js'
export { encodeBrain, decodeBrain, SNAPSHOT_MAGIC } from './snapshot.js'
export { BrainFileError, BrainInvariantError } from './errors.js'
export type { BrainFileErrorCode } from './errors.js'
