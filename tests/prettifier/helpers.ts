/**
 * Shared fakes for prettifier tests.
 */
import { Either } from 'effect'
import { RenderFailedError, type RenderError } from '../../src/effect/errors'
import type { ContentDetector, ContentRenderer } from '../../src/prettifier/registry'
import {
  plainLine,
  type ContentBlock,
  type DetectionResult,
  type RenderedContent,
} from '../../src/prettifier/types'

/** Matches any block with a line starting with `prefix` */
export const prefixDetector = (
  formatId: string,
  prefix: string,
  confidence = 0.9
): ContentDetector => ({
  formatId,
  displayName: formatId,
  quickMatch: (lines) => lines.some((line) => line.startsWith(prefix)),
  detect: (content: ContentBlock): DetectionResult | null =>
    content.lines.some((line) => line.startsWith(prefix))
      ? {
          formatId,
          confidence,
          matchedRules: [`${formatId}_prefix`],
          source: 'HeuristicScan',
        }
      : null,
})

/** Prefixes every line with its badge and counts invocations */
export class CountingRenderer implements ContentRenderer {
  calls = 0
  readonly displayName: string
  readonly formatBadge: string

  constructor(readonly formatId: string) {
    this.displayName = formatId
    this.formatBadge = formatId.toUpperCase()
  }

  render(content: ContentBlock): Either.Either<RenderedContent, RenderError> {
    this.calls++
    return Either.right({
      lines: content.lines.map((line) => plainLine(`${this.formatBadge}|${line}`)),
      formatBadge: this.formatBadge,
      lineMapping: content.lines.map((_, i) => ({ renderedLine: i, sourceLine: i })),
    })
  }
}

export class FailingRenderer implements ContentRenderer {
  calls = 0
  readonly displayName = 'failing'
  readonly formatBadge = 'FAIL'

  constructor(readonly formatId: string) {}

  render(): Either.Either<RenderedContent, RenderError> {
    this.calls++
    return Either.left(new RenderFailedError({ formatId: this.formatId, reason: 'test failure' }))
  }
}

export interface ManualClock {
  readonly now: () => number
  advance(ms: number): void
}

export const manualClock = (start = 0): ManualClock => {
  let time = start
  return {
    now: () => time,
    advance: (ms) => {
      time += ms
    },
  }
}

/** Rows for consecutive lines starting at `startRow` */
export const rowLines = (lines: readonly string[], startRow: number) =>
  lines.map((text, i) => ({ text, row: startRow + i }))
