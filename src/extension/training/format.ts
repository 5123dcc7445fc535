/**
 * Training input format detection and dispatch.
 *
 * The media type wins over the filename when both are given and the media
 * type is recognized. A charset parameter on the media type decides how
 * bytes are decoded; otherwise UTF-8.
 */

import { extname } from 'node:path'
import type { Sentence } from '../brain/sentence.js'
import { parseHtml, parseFeed } from './html.js'
import { parsePlain, parseMarkdown, parseMegaHal, parsePreTagged } from './text-formats.js'

export type TrainingFormat = 'html' | 'feed' | 'markdown' | 'plain' | 'megahal' | 'json'

export interface TrainingSource {
  filename?: string
  mediaType?: string
}

const MEDIA_TYPES: Readonly<Record<string, TrainingFormat>> = {
  'text/html': 'html',
  'text/markdown': 'markdown',
  'text/x-markdown': 'markdown',
  // Not every XML document is a feed; the feed parser says so if not.
  'application/rss': 'feed',
  'application/rss+xml': 'feed',
  'text/rss': 'feed',
  'application/atom+xml': 'feed',
  'application/atom': 'feed',
  'text/atom': 'feed',
  'application/xml': 'feed',
  'text/xml': 'feed',
  'text/plain': 'plain',
  'application/json': 'json',
}

const EXTENSIONS: Readonly<Record<string, TrainingFormat>> = {
  '.html': 'html',
  '.htm': 'html',
  '.md': 'markdown',
  '.rss': 'feed',
  '.atom': 'feed',
  '.xml': 'feed',
  '.txt': 'plain',
  '.trn': 'megahal',
  '.json': 'json',
}

const PARSERS: Readonly<Record<TrainingFormat, (text: string) => Sentence[]>> = {
  html: parseHtml,
  feed: parseFeed,
  markdown: parseMarkdown,
  plain: parsePlain,
  megahal: parseMegaHal,
  json: parsePreTagged,
}

interface MediaType {
  type: string
  charset?: string
}

function parseMediaType(mediaType: string): MediaType {
  const [type, ...params] = mediaType.split(';').map((p) => p.trim())
  const ret: MediaType = { type: type.toLowerCase() }
  for (const param of params) {
    const eq = param.indexOf('=')
    if (eq < 0) continue
    if (param.slice(0, eq).trim().toLowerCase() === 'charset') {
      ret.charset = param.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1')
    }
  }
  return ret
}

export function selectFormat(source: TrainingSource): TrainingFormat | null {
  if (source.mediaType) {
    const { type } = parseMediaType(source.mediaType)
    if (Object.hasOwn(MEDIA_TYPES, type)) return MEDIA_TYPES[type]
  }
  if (source.filename) {
    const ext = extname(source.filename).toLowerCase()
    if (Object.hasOwn(EXTENSIONS, ext)) return EXTENSIONS[ext]
  }
  return null
}

function decodeBytes(bytes: Uint8Array, charset: string | undefined): string {
  if (charset) {
    try {
      return new TextDecoder(charset).decode(bytes)
    } catch (err) {
      if (!(err instanceof RangeError)) throw err
      // Unknown charset label; fall through to UTF-8.
    }
  }
  return new TextDecoder('utf-8').decode(bytes)
}

/** Extract sentences from a training document of any supported format. */
export function parseTrainingInput(input: Uint8Array | string, source: TrainingSource): Sentence[] {
  const format = selectFormat(source)
  if (format === null) {
    throw new Error('failed to detect file format from filename or media type')
  }
  const charset = source.mediaType ? parseMediaType(source.mediaType).charset : undefined
  const text = typeof input === 'string' ? input : decodeBytes(input, charset)
  return PARSERS[format](text)
}
