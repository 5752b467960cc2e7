import { describe, expect, it } from 'vitest'

import { computeFingerprint, DualViewBuffer } from '../../src/prettifier/buffer'
import {
  lineText,
  makeContentBlock,
  plainLine,
  type RenderedContent,
} from '../../src/prettifier/types'

const source = makeContentBlock({ lines: ['# Title', 'body'], startRow: 0, timestamp: 0 })

const rendered: RenderedContent = {
  lines: [plainLine('Title'), plainLine('-----'), plainLine('body')],
  formatBadge: 'MD',
  lineMapping: [
    { renderedLine: 0, sourceLine: 0 },
    { renderedLine: 1, sourceLine: null },
    { renderedLine: 2, sourceLine: 1 },
  ],
}

describe('computeFingerprint', () => {
  it('is stable for equal line sequences', () => {
    expect(computeFingerprint(['a', 'b'])).toBe(computeFingerprint(['a', 'b']))
  })

  it('differs when content changes', () => {
    expect(computeFingerprint(['a', 'b'])).not.toBe(computeFingerprint(['a', 'c']))
  })

  it('is prefixed with line count and character count', () => {
    expect(computeFingerprint(['ab', 'c']).startsWith('2:3:')).toBe(true)
    expect(computeFingerprint(['abc']).startsWith('1:3:')).toBe(true)
  })
})

describe('DualViewBuffer', () => {
  it('shows the source until something is rendered', () => {
    const buffer = new DualViewBuffer(source)

    expect(buffer.viewMode).toBe('rendered')
    expect(buffer.renderedContent).toBeNull()
    expect(buffer.displayLines().map(lineText)).toEqual(['# Title', 'body'])
    expect(buffer.renderedText()).toBeNull()
    expect(buffer.needsRender(80)).toBe(true)
  })

  it('tracks the width a rendering was made for', () => {
    const buffer = new DualViewBuffer(source)
    buffer.setRendered(rendered, 80)

    expect(buffer.width).toBe(80)
    expect(buffer.needsRender(80)).toBe(false)
    expect(buffer.needsRender(120)).toBe(true)
  })

  it('switches between rendered and source views', () => {
    const buffer = new DualViewBuffer(source)
    buffer.setRendered(rendered, 80)

    expect(buffer.displayLineCount()).toBe(3)
    expect(buffer.displayLines().map(lineText)).toEqual(['Title', '-----', 'body'])

    buffer.toggleView()
    expect(buffer.viewMode).toBe('source')
    expect(buffer.displayLineCount()).toBe(2)
    expect(buffer.displayLines().map(lineText)).toEqual(['# Title', 'body'])

    buffer.toggleView()
    expect(buffer.viewMode).toBe('rendered')
  })

  it('returns a window of display lines', () => {
    const buffer = new DualViewBuffer(source)
    buffer.setRendered(rendered, 80)
    expect(buffer.displayLinesRange(1, 2).map(lineText)).toEqual(['-----', 'body'])
  })

  it('exposes both texts', () => {
    const buffer = new DualViewBuffer(source)
    buffer.setRendered(rendered, 80)
    expect(buffer.sourceText()).toBe('# Title\nbody')
    expect(buffer.renderedText()).toBe('Title\n-----\nbody')
  })

  it('maps lines between views', () => {
    const buffer = new DualViewBuffer(source)
    expect(buffer.sourceToRenderedLines(0)).toEqual([])

    buffer.setRendered(rendered, 80)
    expect(buffer.renderedToSourceLine(0)).toBe(0)
    expect(buffer.renderedToSourceLine(1)).toBeNull()
    expect(buffer.renderedToSourceLine(2)).toBe(1)
    expect(buffer.renderedToSourceLine(9)).toBeNull()
    expect(buffer.sourceToRenderedLines(1)).toEqual([2])
  })

  it('fingerprints its source once', () => {
    const buffer = new DualViewBuffer(source)
    expect(buffer.fingerprint).toBe(computeFingerprint(['# Title', 'body']))
  })
})
