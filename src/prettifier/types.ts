/**
 * Core data model for the prettifier: content blocks, detection results,
 * styled output and the renderer environment.
 */
import type { RowRange } from '../core/row-range'
import type { DetectionSource } from '../effect/types'

// =============================================================================
// Content Blocks
// =============================================================================

/**
 * A contiguous span of terminal output lines treated as one formatting unit.
 * `startRow` is inclusive, `endRow` exclusive. Never mutated; changed content
 * produces a new block.
 */
export interface ContentBlock {
  readonly lines: readonly string[]
  readonly precedingCommand: string | null
  readonly startRow: number
  readonly endRow: number
  /** Creation time in epoch milliseconds */
  readonly timestamp: number
}

export interface ContentBlockInit {
  lines: readonly string[]
  startRow: number
  endRow?: number
  precedingCommand?: string | null
  timestamp?: number
}

/**
 * Build a block. `endRow` defaults to `startRow + lines.length`.
 */
export function makeContentBlock(init: ContentBlockInit): ContentBlock {
  return Object.freeze({
    lines: Object.freeze([...init.lines]),
    precedingCommand: init.precedingCommand ?? null,
    startRow: init.startRow,
    endRow: init.endRow ?? init.startRow + init.lines.length,
    timestamp: init.timestamp ?? Date.now(),
  })
}

export function rowRangeOf(block: ContentBlock): RowRange {
  return { start: block.startRow, end: block.endRow }
}

export function firstLines(block: ContentBlock, count: number): readonly string[] {
  return block.lines.slice(0, count)
}

export function lastLines(block: ContentBlock, count: number): readonly string[] {
  return block.lines.slice(Math.max(0, block.lines.length - count))
}

export function fullText(block: ContentBlock): string {
  return block.lines.join('\n')
}

// =============================================================================
// Detection
// =============================================================================

export interface DetectionResult {
  readonly formatId: string
  /** 0.0 to 1.0 */
  readonly confidence: number
  readonly matchedRules: readonly string[]
  readonly source: DetectionSource
}

// =============================================================================
// Styled Output
// =============================================================================

export type Rgb = readonly [number, number, number]

export interface StyledSegment {
  readonly text: string
  readonly fg?: Rgb
  readonly bg?: Rgb
  readonly bold?: boolean
  readonly italic?: boolean
  readonly underline?: boolean
  readonly dim?: boolean
  readonly strikethrough?: boolean
}

export interface StyledLine {
  readonly segments: readonly StyledSegment[]
}

/** Maps a rendered line back to the source line it came from (null for decoration) */
export interface LineMapping {
  readonly renderedLine: number
  readonly sourceLine: number | null
}

export interface RenderedContent {
  readonly lines: readonly StyledLine[]
  /** Short label for the gutter, e.g. "JSON" */
  readonly formatBadge: string | null
  readonly lineMapping: readonly LineMapping[]
}

export function plainLine(text: string): StyledLine {
  return { segments: [{ text }] }
}

export function lineText(line: StyledLine): string {
  return line.segments.map((segment) => segment.text).join('')
}

// =============================================================================
// Renderer Environment
// =============================================================================

export interface ThemeColors {
  readonly fg: Rgb
  readonly bg: Rgb
  /** The 16 ANSI colors */
  readonly palette: readonly Rgb[]
}

export interface RendererConfig {
  /** Terminal width in columns */
  readonly terminalWidth: number
  /** Cell metrics in pixels, for sizing width-sensitive inline content */
  readonly cellWidthPx: number | null
  readonly cellHeightPx: number | null
  readonly themeColors: ThemeColors
}
