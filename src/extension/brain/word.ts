/**
 * Word: a single part-of-speech-tagged token.
 *
 * Words are plain immutable values. Text is NFC-normalized and lower-cased
 * at construction so that two spellings of the same token always compare
 * equal, whatever casing or normalization form the source text used.
 */

// ==================== Types ====================

export interface Word {
  readonly tag: string
  readonly text: string
}

/** Closed taxonomy of the tags the brain cares about. */
export type TagCategory = 'proper-noun' | 'noun' | 'other'

// ==================== Construction ====================

export function makeWord(tag: string, text: string): Word {
  return Object.freeze({ tag, text: text.normalize('NFC').toLowerCase() })
}

export const PERIOD = makeWord('.', '.')
export const QUESTION_MARK = makeWord('.', '?')
export const EXCLAMATION_MARK = makeWord('.', '!')

/**
 * The word returned when a snapshot references a word index that doesn't
 * exist. It has neither tag nor text, so it never matches a real token.
 */
export const INVALID_WORD: Word = Object.freeze({ tag: '', text: '' })

// ==================== Identity ====================

/** Stable map key for a word. Two words share a key iff they are equal. */
export function wordKey(w: Word): string {
  return `${w.tag}\u0000${w.text}`
}

export function wordsEqual(a: Word, b: Word): boolean {
  return a.tag === b.tag && a.text === b.text
}

// ==================== Classification ====================

const TAG_CATEGORIES: Readonly<Record<string, TagCategory>> = {
  NN: 'noun',
  NNS: 'noun',
  NNP: 'proper-noun',
  NNPS: 'proper-noun',
}

export function classifyTag(tag: string): TagCategory {
  return Object.hasOwn(TAG_CATEGORIES, tag) ? TAG_CATEGORIES[tag] : 'other'
}

/** True for common and proper nouns alike. */
export function isNoun(w: Word): boolean {
  return classifyTag(w.tag) !== 'other'
}

export function isProperNoun(w: Word): boolean {
  return classifyTag(w.tag) === 'proper-noun'
}

export function isHashtag(w: Word): boolean {
  return isNoun(w) && w.text.startsWith('#')
}

export function isAtMention(w: Word): boolean {
  return isNoun(w) && w.text.startsWith('@')
}

// ==================== JSON ====================

/** JSON form of a word: `[text, tag]`. */
export type WordPair = [text: string, tag: string]

export function wordToPair(w: Word): WordPair {
  return [w.text, w.tag]
}

export function wordFromPair([text, tag]: WordPair): Word {
  return makeWord(tag, text)
}
