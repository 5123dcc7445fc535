/**
 * Conversation policy: how the bot answers one user turn.
 *
 * "why" questions get a reason sentence when one exists; otherwise a
 * keyword reply; otherwise a random question to change the subject. The
 * user's sentences are learned after the reply is chosen, so the bot never
 * simply parrots the turn it is answering.
 */

import type { Brain } from '../extension/brain/Brain.js'
import { type Sentence, trimPeriod } from '../extension/brain/sentence.js'
import { makeWord, wordsEqual } from '../extension/brain/word.js'
import { parseText } from '../extension/training/parse-text.js'

const WHY = makeWord('WRB', 'why')

export interface RespondOptions {
  /** Drop a trailing period from replies and learned sentences (chat style). */
  trimPeriod?: boolean
  /** Learn the user's sentences after replying. */
  learn?: boolean
}

export interface Turn {
  /** The user's text as the tagger understood it. */
  understood: Sentence[]
  /** Empty when the bot has nothing to say. */
  reply: Sentence
}

export function isWhyQuestion(sentences: readonly Sentence[]): boolean {
  const first = sentences[0]?.[0]
  return first !== undefined && wordsEqual(first, WHY)
}

export function chooseReply(brain: Brain, sentences: readonly Sentence[]): Sentence {
  let reply: Sentence = []
  if (isWhyQuestion(sentences)) reply = brain.makeReason()
  if (reply.length === 0) reply = brain.makeReply(...sentences)
  if (reply.length === 0) reply = brain.makeQuestion()
  return reply
}

export function respond(brain: Brain, text: string, opts: RespondOptions = {}): Turn {
  const trim = opts.trimPeriod ?? true
  const understood = parseText(text)

  let reply = chooseReply(brain, understood)
  if (trim) reply = trimPeriod(reply)

  if (opts.learn ?? true) {
    brain.addSentences(trim ? understood.map(trimPeriod) : understood)
  }
  return { understood, reply }
}
