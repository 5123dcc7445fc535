/**
 * Brain snapshot codec.
 *
 * Layout: the four magic bytes "QWOK" followed by one MessagePack map:
 *
 *   { chainLen: 4,
 *     words:  [[text, tag], ...],
 *     chains: [{ w: [i, i, i, i], a: [i...], b: [i...], s: bool, e: bool }, ...] }
 *
 * Each distinct word is stored once in `words`; everything else refers to
 * it by index. `w` is the chain itself, `a`/`b` the words recorded after /
 * before it, `s`/`e` whether it may start / end a sentence. `a` and `b` may
 * be nil when empty.
 */

import { encode, decode } from '@msgpack/msgpack'
import { z } from 'zod'
import { type Word, INVALID_WORD, wordKey } from './word.js'
import { type Chain, CHAIN_LEN } from './chain.js'
import { Brain, type BrainOptions } from './Brain.js'
import { BrainFileError } from './errors.js'

export const SNAPSHOT_MAGIC = new Uint8Array([0x51, 0x57, 0x4f, 0x4b]) // "QWOK"

// ==================== Schema ====================

const indicesSchema = z
  .array(z.number().int())
  .nullish()
  .transform((v) => v ?? [])

const chainRecordSchema = z.object({
  w: indicesSchema,
  a: indicesSchema,
  b: indicesSchema,
  s: z.boolean().default(false),
  e: z.boolean().default(false),
})

const snapshotSchema = z.object({
  chainLen: z.number().int(),
  words: z
    .array(z.tuple([z.string(), z.string()]))
    .nullish()
    .transform((v) => v ?? []),
  chains: z
    .array(chainRecordSchema)
    .nullish()
    .transform((v) => v ?? []),
})

type SnapshotPayload = z.input<typeof snapshotSchema>
type SnapshotChainRecord = z.input<typeof chainRecordSchema>

// ==================== Encode ====================

export function encodeBrain(brain: Brain): Uint8Array {
  const words: [string, string][] = []
  const indices = new Map<string, number>()

  const indexOf = (w: Word): number => {
    const key = wordKey(w)
    let idx = indices.get(key)
    if (idx === undefined) {
      idx = words.length
      indices.set(key, idx)
      words.push([w.text, w.tag])
    }
    return idx
  }

  const chains: SnapshotChainRecord[] = []
  for (const record of brain.chainRecords()) {
    chains.push({
      w: record.chain.map(indexOf),
      a: record.wordsAfter.map(indexOf),
      b: record.wordsBefore.map(indexOf),
      s: record.canStart,
      e: record.canEnd,
    })
  }

  const payload: SnapshotPayload = { chainLen: CHAIN_LEN, words, chains }
  const body = encode(payload)

  const out = new Uint8Array(SNAPSHOT_MAGIC.length + body.length)
  out.set(SNAPSHOT_MAGIC, 0)
  out.set(body, SNAPSHOT_MAGIC.length)
  return out
}

// ==================== Decode ====================

function hasMagic(bytes: Uint8Array): boolean {
  if (bytes.length < SNAPSHOT_MAGIC.length) return false
  return SNAPSHOT_MAGIC.every((b, i) => bytes[i] === b)
}

/**
 * Build a new brain from snapshot bytes. Throws BrainFileError on any
 * format problem; no brain is returned in that case.
 */
export function decodeBrain(bytes: Uint8Array, options: BrainOptions = {}): Brain {
  if (!hasMagic(bytes)) {
    throw new BrainFileError('NOT_A_BRAIN_FILE', 'not a brain file')
  }

  let raw: unknown
  try {
    raw = decode(bytes.subarray(SNAPSHOT_MAGIC.length))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new BrainFileError('INVALID_BRAIN_FILE', `invalid brain file: ${reason}`)
  }

  const parsed = snapshotSchema.safeParse(raw)
  if (!parsed.success) {
    throw new BrainFileError('INVALID_BRAIN_FILE', `invalid brain file: ${parsed.error.message}`)
  }
  const snapshot = parsed.data

  if (snapshot.chainLen !== CHAIN_LEN) {
    throw new BrainFileError(
      'WRONG_CHAIN_LENGTH',
      `wrong chain length ${snapshot.chainLen}; need ${CHAIN_LEN}`,
    )
  }

  const table: Word[] = snapshot.words.map(([text, tag]) => Object.freeze({ tag, text }))
  const wordAt = (i: number): Word => (i >= 0 && i < table.length ? table[i] : INVALID_WORD)

  // Check every record before touching the brain so a bad file never
  // yields a half-built one.
  snapshot.chains.forEach((fc, i) => {
    if (fc.w.length !== CHAIN_LEN) {
      throw new BrainFileError(
        'MALFORMED_CHAIN',
        `chain ${i} has wrong length ${fc.w.length}; need ${CHAIN_LEN}`,
      )
    }
  })

  const brain = new Brain(options)
  for (const fc of snapshot.chains) {
    const chain: Chain = [wordAt(fc.w[0]), wordAt(fc.w[1]), wordAt(fc.w[2]), wordAt(fc.w[3])]
    brain.restoreChain({
      chain,
      wordsAfter: fc.a.map(wordAt),
      wordsBefore: fc.b.map(wordAt),
      canStart: fc.s,
      canEnd: fc.e,
    })
  }
  return brain
}
