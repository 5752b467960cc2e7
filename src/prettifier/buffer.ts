/**
 * Dual-view buffer: the raw block plus an optional rendering of it.
 */
import { Hash } from 'effect'
import { Fingerprint, type ViewMode } from '../effect/types'
import {
  fullText,
  lineText,
  plainLine,
  type ContentBlock,
  type RenderedContent,
  type StyledLine,
} from './types'

/**
 * Fingerprint a line sequence.
 * The 32-bit hash is prefixed with the line count and total character count,
 * so a collision also needs equal shape to be mistaken for the same content.
 */
export function computeFingerprint(lines: readonly string[]): Fingerprint {
  let hash = Hash.number(lines.length)
  let totalChars = 0
  for (const line of lines) {
    hash = Hash.combine(Hash.string(line))(hash)
    totalChars += line.length
  }
  return Fingerprint.make(
    `${lines.length}:${totalChars}:${(hash >>> 0).toString(16).padStart(8, '0')}`
  )
}

export class DualViewBuffer {
  private rendered: RenderedContent | null = null
  private renderedWidth: number | null = null
  private mode: ViewMode = 'rendered'
  readonly fingerprint: Fingerprint

  constructor(readonly source: ContentBlock) {
    this.fingerprint = computeFingerprint(source.lines)
  }

  get viewMode(): ViewMode {
    return this.mode
  }

  get renderedContent(): RenderedContent | null {
    return this.rendered
  }

  /** Width the current rendering was produced for */
  get width(): number | null {
    return this.renderedWidth
  }

  setRendered(rendered: RenderedContent, terminalWidth: number): void {
    this.rendered = rendered
    this.renderedWidth = terminalWidth
  }

  needsRender(terminalWidth: number): boolean {
    return this.renderedWidth !== terminalWidth
  }

  toggleView(): void {
    this.mode = this.mode === 'rendered' ? 'source' : 'rendered'
  }

  /**
   * Lines to display for the current view. Falls back to the source when
   * nothing has been rendered.
   */
  displayLines(): readonly StyledLine[] {
    if (this.mode === 'rendered' && this.rendered) {
      return this.rendered.lines
    }
    return this.source.lines.map(plainLine)
  }

  displayLineCount(): number {
    if (this.mode === 'rendered' && this.rendered) {
      return this.rendered.lines.length
    }
    return this.source.lines.length
  }

  displayLinesRange(start: number, count: number): readonly StyledLine[] {
    if (this.mode === 'rendered' && this.rendered) {
      return this.rendered.lines.slice(start, start + count)
    }
    return this.source.lines.slice(start, start + count).map(plainLine)
  }

  sourceText(): string {
    return fullText(this.source)
  }

  renderedText(): string | null {
    if (!this.rendered) return null
    return this.rendered.lines.map(lineText).join('\n')
  }

  renderedToSourceLine(renderedLine: number): number | null {
    const mapping = this.rendered?.lineMapping.find((m) => m.renderedLine === renderedLine)
    return mapping?.sourceLine ?? null
  }

  sourceToRenderedLines(sourceLine: number): number[] {
    if (!this.rendered) return []
    return this.rendered.lineMapping
      .filter((m) => m.sourceLine === sourceLine)
      .map((m) => m.renderedLine)
  }
}
