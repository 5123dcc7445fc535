/**
 * HTML and feed extraction.
 *
 * Only text inside paragraphs and list items is taken as prose. Containers
 * that rarely hold sentences (tables, code, navigation, media, quotes) are
 * dropped before anything is read.
 */

import * as cheerio from 'cheerio'
import type { Sentence } from '../brain/sentence.js'
import { parseText } from './parse-text.js'

const NON_PROSE = [
  'script', 'style', 'frameset', 'frame', 'applet', 'object', 'form', 'label',
  'pre', 'plaintext', 'listing', 'menu', 'table', 'td', 'tr', 'th', 'map',
  'noframes', 'iframe', 'picture', 'img', 'canvas', 'svg', 'video', 'audio',
  'blockquote', 'nav', 'figure',
].join(', ')

const PROSE = 'p, li'

function extractProse($: cheerio.CheerioAPI): Sentence[] {
  $(NON_PROSE).remove()
  const ret: Sentence[] = []
  $(PROSE)
    .filter((_, el) => $(el).parents(PROSE).length === 0)
    .each((_, el) => {
      ret.push(...parseText($(el).text()))
    })
  return ret
}

export function parseHtml(html: string): Sentence[] {
  return extractProse(cheerio.load(html))
}

/**
 * Parse a fragment such as a feed item body. Loose text at the top level
 * means the fragment is already the inside of a prose element, so all of
 * its text is taken.
 */
export function parseHtmlFragment(html: string): Sentence[] {
  const loose = cheerio.load(html, null, false)
  loose.root().children().remove()
  const hasLooseText = loose.root().text().trim() !== ''

  const $ = cheerio.load(html, null, false)
  if (!hasLooseText) return extractProse($)

  $(NON_PROSE).remove()
  return parseText($.root().text())
}

/** RSS 1/2 and Atom. Titles are plain text; bodies are HTML fragments. */
export function parseFeed(xml: string): Sentence[] {
  const $ = cheerio.load(xml, { xml: true })
  if ($('rss, feed, rdf\\:RDF').length === 0) {
    throw new Error('error parsing feed: not an RSS or Atom document')
  }

  const ret: Sentence[] = []
  $('item, entry').each((_, item) => {
    const $item = $(item)
    ret.push(...parseText($item.children('title').text()))
    for (const body of ['content\\:encoded', 'content', 'description', 'summary']) {
      const html = $item.children(body).first().text()
      if (html.trim() !== '') ret.push(...parseHtmlFragment(html))
    }
  })
  return ret
}
