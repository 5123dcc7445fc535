import { describe, it, expect } from 'vitest'
import { selectFormat, parseTrainingInput } from './format.js'
import type { Sentence } from '../brain/sentence.js'

const texts = (sentences: Sentence[]) => sentences.map((s) => s.map((w) => w.text).join(' '))

// ==================== Detection ====================

describe('selectFormat', () => {
  it('should pick a format from the file extension', () => {
    expect(selectFormat({ filename: 'notes/today.MD' })).toBe('markdown')
    expect(selectFormat({ filename: 'page.htm' })).toBe('html')
    expect(selectFormat({ filename: 'corpus.trn' })).toBe('megahal')
    expect(selectFormat({ filename: 'news.atom' })).toBe('feed')
  })

  it('should prefer a known media type over the extension', () => {
    expect(selectFormat({ filename: 'page.txt', mediaType: 'text/html; charset=utf-8' })).toBe('html')
  })

  it('should fall back to the extension for an unknown media type', () => {
    expect(selectFormat({ filename: 'page.txt', mediaType: 'application/octet-stream' })).toBe('plain')
  })

  it('should return null when nothing matches', () => {
    expect(selectFormat({ filename: 'photo.png' })).toBeNull()
    expect(selectFormat({})).toBeNull()
  })
})

describe('parseTrainingInput', () => {
  it('should refuse input of unknown format', () => {
    expect(() => parseTrainingInput('hello', { filename: 'data.bin' })).toThrow(
      'failed to detect file format from filename or media type',
    )
  })

  it('should decode bytes with the declared charset', () => {
    const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9, 0x20, 0x6f, 0x6b]) // "café ok"
    const sentences = parseTrainingInput(latin1, { mediaType: 'text/plain; charset=iso-8859-1' })
    expect(texts(sentences)).toEqual(['café ok'])
  })

  it('should decode bytes as UTF-8 by default', () => {
    const bytes = new TextEncoder().encode('über alles.')
    expect(texts(parseTrainingInput(bytes, { filename: 'a.txt' }))).toEqual(['über alles .'])
  })
})

// ==================== Formats ====================

describe('plain text', () => {
  it('should join wrapped lines within a paragraph', () => {
    const text = 'One two three.\nFour five.\n\nSix seven!\n'
    expect(texts(parseTrainingInput(text, { filename: 'a.txt' }))).toEqual([
      'one two three .',
      'four five .',
      'six seven !',
    ])
  })
})

describe('MegaHAL training files', () => {
  it('should read one utterance per line and skip comments', () => {
    const text = '# greetings\nHello there.\n\nHow are you?\n'
    expect(texts(parseTrainingInput(text, { filename: 'megahal.trn' }))).toEqual([
      'hello there .',
      'how are you ?',
    ])
  })
})

describe('pre-tagged JSON', () => {
  it('should keep the given tags', () => {
    const text = JSON.stringify([[['Hi', 'UH'], ['Bob', 'NNP']]])
    expect(parseTrainingInput(text, { filename: 'tagged.json' })).toEqual([
      [{ tag: 'UH', text: 'hi' }, { tag: 'NNP', text: 'bob' }],
    ])
  })

  it('should reject the wrong shape', () => {
    expect(() => parseTrainingInput('{"hi": 1}', { filename: 'tagged.json' })).toThrow(
      /^pre-tagged JSON must be an array of \[text, tag\] sentences/,
    )
  })
})

describe('HTML', () => {
  it('should read paragraphs and list items but not navigation, tables or scripts', () => {
    const html = [
      '<html><head><title>Ignored title</title></head><body>',
      '<nav><p>Menu item.</p></nav>',
      '<p>The cat sat on the mat.</p>',
      '<ul><li>Dogs like long walks.</li></ul>',
      '<table><tr><td><p>Skip me.</p></td></tr></table>',
      '<script>var x = 1;</script>',
      '</body></html>',
    ].join('')
    expect(texts(parseTrainingInput(html, { filename: 'page.html' }))).toEqual([
      'the cat sat on the mat .',
      'dogs like long walks .',
    ])
  })

  it('should read a nested paragraph only once', () => {
    const html = '<ul><li><p>Only once.</p></li></ul>'
    expect(texts(parseTrainingInput(html, { mediaType: 'text/html' }))).toEqual(['only once .'])
  })
})

describe('feeds', () => {
  it('should read item titles and bodies', () => {
    const rss = [
      '<?xml version="1.0"?>',
      '<rss version="2.0"><channel><title>Channel</title>',
      '<item><title>Big News Today</title>',
      '<description>&lt;p&gt;The cat sat down.&lt;/p&gt;</description></item>',
      '</channel></rss>',
    ].join('\n')
    expect(texts(parseTrainingInput(rss, { filename: 'news.rss' }))).toEqual([
      'big news today',
      'the cat sat down .',
    ])
  })

  it('should take loose text in a body as prose', () => {
    const atom = [
      '<feed xmlns="http://www.w3.org/2005/Atom">',
      '<entry><title>Hello</title><summary>Plain summary here.</summary></entry>',
      '</feed>',
    ].join('\n')
    expect(texts(parseTrainingInput(atom, { mediaType: 'application/atom+xml' }))).toEqual([
      'hello',
      'plain summary here .',
    ])
  })

  it('should read CDATA HTML from content:encoded', () => {
    const rss = [
      '<?xml version="1.0"?>',
      '<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/"><channel>',
      '<item><title>Launch Day</title>',
      '<content:encoded><![CDATA[<p>We shipped it today.</p><pre>skip();</pre>]]></content:encoded></item>',
      '</channel></rss>',
    ].join('\n')
    expect(texts(parseTrainingInput(rss, { filename: 'news.rss' }))).toEqual([
      'launch day',
      'we shipped it today .',
    ])
  })

  it('should refuse XML that is not a feed', () => {
    expect(() => parseTrainingInput('<notes><note>hi</note></notes>', { filename: 'notes.xml' })).toThrow(
      'error parsing feed: not an RSS or Atom document',
    )
  })
})

describe('Markdown', () => {
  it('should keep paragraphs and list items and drop headings, code and tables', () => {
    const md = [
      '# Title Here',
      '',
      'Some **bold** text with a [link](http://example.com).',
      '',
      '- Lists count too.',
      '',
      '```',
      'code block.',
      '```',
      '',
      '| a | b |',
      '| - | - |',
      '| c | d |',
    ].join('\n')
    expect(texts(parseTrainingInput(md, { filename: 'readme.md' }))).toEqual([
      'some bold text with a link .',
      'lists count too .',
    ])
  })

  it('should keep underscores inside words', () => {
    const md = 'set my_var_name before you start the engine.'
    expect(texts(parseTrainingInput(md, { filename: 'notes.md' }))).toEqual([
      'set my_var_name before you start the engine .',
    ])
  })

  it('should keep a paragraph that opens with inline HTML', () => {
    const md = '<b>bold</b> words open this very sentence.'
    expect(texts(parseTrainingInput(md, { mediaType: 'text/markdown' }))).toEqual([
      'bold words open this very sentence .',
    ])
  })
})
