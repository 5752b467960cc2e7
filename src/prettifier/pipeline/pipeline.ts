/**
 * Prettifier pipeline: boundary detection, format detection, rendering and
 * the active block list.
 */
import { Either } from 'effect'
import { createDefaultRendererConfig } from '../../core/config'
import { formatRange, rangeContains, rangesEqual, rangesOverlap, type RowRange } from '../../core/row-range'
import type { PrettifierConfig } from '../../effect/Config'
import { RendererNotFoundError, type RenderError } from '../../effect/errors'
import { makeBlockId, type BlockId, type DetectionScope } from '../../effect/types'
import { BoundaryDetector, type Clock } from '../boundary/detector'
import { computeFingerprint, DualViewBuffer } from '../buffer'
import { ClaudeCodeIntegration, type ClaudeCodeEvent, type SessionEnv } from '../claude-code'
import { logDebug, logWarning } from '../log'
import type { RendererRegistry } from '../registry'
import { RenderCache } from '../render-cache'
import {
  makeContentBlock,
  rowRangeOf,
  type ContentBlock,
  type DetectionResult,
  type RenderedContent,
  type RendererConfig,
} from '../types'
import { PrettifiedBlock } from './block'

export interface PipelineOptions {
  /** Time source for debounce and block timestamps */
  clock?: Clock
}

/** A line of scrollback with the absolute row it was read from */
export interface RowLine {
  readonly text: string
  readonly row: number
}

export class PrettifierPipeline {
  private readonly boundary: BoundaryDetector
  private readonly cache: RenderCache
  private readonly claude: ClaudeCodeIntegration
  private readonly clock: Clock

  /** Sorted ascending by startRow */
  private blocks: PrettifiedBlock[] = []
  private suppressed: RowRange[] = []
  private sessionOverride: boolean | null = null
  private nextBlockId = 0

  constructor(
    private readonly config: PrettifierConfig,
    private readonly registry: RendererRegistry,
    private rendererConfig: RendererConfig = createDefaultRendererConfig(),
    options: PipelineOptions = {}
  ) {
    this.clock = options.clock ?? Date.now
    registry.setConfidenceThreshold(config.confidenceThreshold)

    this.boundary = new BoundaryDetector(
      {
        scope: config.detectionScope,
        maxScanLines: config.maxScanLines,
        debounceMs: config.debounceMs,
        blankLineThreshold: config.blankLineThreshold,
      },
      this.clock
    )
    this.cache = new RenderCache(config.cacheMaxEntries)
    this.claude = new ClaudeCodeIntegration(config.claudeCode)
  }

  // ===========================================================================
  // Output stream
  // ===========================================================================

  processOutput(line: string, row: number): void {
    if (!this.isEnabled()) return
    this.handleEmitted(this.boundary.pushLine(line, row))
  }

  onCommandStart(command: string): void {
    this.boundary.onCommandStart(command)
  }

  onCommandEnd(): void {
    this.handleEmitted(this.boundary.onCommandEnd())
  }

  onAltScreenChange(entering: boolean): void {
    this.handleEmitted(this.boundary.onAltScreenChange(entering))
  }

  onProcessChange(): void {
    this.handleEmitted(this.boundary.onProcessChange())
  }

  checkDebounce(): void {
    this.handleEmitted(this.boundary.checkDebounce())
  }

  /** Emit whatever has accumulated, in any scope */
  flush(): void {
    this.handleEmitted(this.boundary.flush())
  }

  /**
   * Detect and render a complete command output read back from scrollback.
   * The boundary detector is reset first so the same lines are not seen twice.
   */
  submitCommandOutput(lines: readonly RowLine[], command: string | null): void {
    this.boundary.reset()
    const first = lines[0]
    const last = lines[lines.length - 1]
    if (first === undefined || last === undefined) {
      logDebug('submitted command output is empty')
      return
    }

    this.handleBlock(
      makeContentBlock({
        lines: lines.map((line) => line.text),
        precedingCommand: command,
        startRow: first.row,
        endRow: last.row + 1,
        timestamp: this.clock(),
      })
    )
  }

  detectionScope(): DetectionScope {
    return this.boundary.scope()
  }

  resetBoundary(): void {
    this.boundary.reset()
  }

  clearBlocks(): void {
    this.blocks = []
  }

  // ===========================================================================
  // Explicit formatting
  // ===========================================================================

  /**
   * Force `content` to be treated as `formatId`. The block is always stored;
   * when rendering fails it shows the raw lines.
   */
  triggerPrettify(formatId: string, content: ContentBlock): BlockId {
    const detection: DetectionResult = {
      formatId,
      confidence: 1.0,
      matchedRules: [],
      source: 'TriggerInvoked',
    }
    const buffer = new DualViewBuffer(content)
    const rendered = this.renderWithCache(buffer, formatId)
    if (Either.isRight(rendered)) {
      buffer.setRendered(rendered.right, this.rendererConfig.terminalWidth)
    }

    const block = this.insertBlock(detection, buffer)
    logDebug('prettify triggered', {
      format: formatId,
      rows: formatRange(block.rowRange),
      rendered: block.hasRendered,
    })
    return block.blockId
  }

  // ===========================================================================
  // Enable state and per-block view
  // ===========================================================================

  isEnabled(): boolean {
    return this.sessionOverride ?? this.config.enabled
  }

  toggleGlobal(): void {
    this.sessionOverride = !this.isEnabled()
  }

  /** Flip one block between rendered and source view. False if unknown. */
  toggleBlock(blockId: BlockId): boolean {
    const block = this.blocks.find((b) => b.blockId === blockId)
    if (!block) return false
    block.buffer.toggleView()
    return true
  }

  activeBlocks(): readonly PrettifiedBlock[] {
    return this.blocks
  }

  /**
   * The block covering `row` (`startRow <= row < endRow`).
   */
  blockAtRow(row: number): PrettifiedBlock | null {
    // Index of the first block starting after `row`
    let lo = 0
    let hi = this.blocks.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.blocks[mid].content.startRow <= row) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }
    if (lo === 0) return null

    const candidate = this.blocks[lo - 1]
    return row < candidate.content.endRow ? candidate : null
  }

  // ===========================================================================
  // Suppression
  // ===========================================================================

  suppressDetection(range: RowRange): void {
    if (!this.suppressed.some((r) => rangesEqual(r, range))) {
      this.suppressed.push({ start: range.start, end: range.end })
    }
  }

  isSuppressed(range: RowRange): boolean {
    return this.suppressed.some((r) => rangeContains(r, range))
  }

  suppressedRanges(): readonly RowRange[] {
    return this.suppressed
  }

  // ===========================================================================
  // Claude Code session
  // ===========================================================================

  claudeCode(): ClaudeCodeIntegration {
    return this.claude
  }

  detectClaudeCodeSession(env: SessionEnv, processName: string): boolean {
    return this.claude.detectSession(env, processName)
  }

  markClaudeCodeActive(): void {
    this.claude.markActive()
  }

  processClaudeCodeLine(line: string, row: number): ClaudeCodeEvent | null {
    return this.claude.processLine(line, row)
  }

  /**
   * Re-detect content the tool just expanded, using the lines of the active
   * blocks that overlap `range`. A collapse marker on the first row of the
   * range is moved to the expanded state.
   */
  onClaudeCodeExpand(range: RowRange): void {
    const collapseId = this.claude.collapseIdAtRow(range.start)
    if (collapseId !== null) this.claude.onExpand(collapseId, range)

    if (!this.claude.config().autoRenderOnExpand) return

    const content = this.extractContentBlock(range)
    if (content.lines.length === 0) return

    const detection = this.registry.detect(content)
    if (detection === null) return
    if (!this.claude.rendersFormat(detection.formatId)) {
      logDebug('expanded content left raw', { format: detection.formatId })
      return
    }

    const buffer = new DualViewBuffer(content)
    const rendered = this.renderWithCache(buffer, detection.formatId)
    if (Either.isRight(rendered)) {
      buffer.setRendered(rendered.right, this.rendererConfig.terminalWidth)
    }

    const block = this.insertBlock({ ...detection, source: 'ExpansionReplay' }, buffer)
    if (collapseId !== null && block.hasRendered) {
      this.claude.markPrettified(collapseId)
    }
    logDebug('expanded content replayed', {
      format: detection.formatId,
      rows: formatRange(block.rowRange),
    })
  }

  /**
   * Move the collapse marker on the first row of `range` back to the
   * collapsed state, with a preview of the block under it.
   */
  onClaudeCodeCollapse(range: RowRange): ClaudeCodeEvent | null {
    const collapseId = this.claude.collapseIdAtRow(range.start)
    if (collapseId === null) return null

    const block = this.blocks.find((b) => rangesOverlap(b.rowRange, range))
    const preview =
      block === undefined
        ? null
        : ClaudeCodeIntegration.generatePreview(
            block.content,
            block.detection,
            this.claude.config().showFormatBadges
          )
    return this.claude.onCollapse(collapseId, range, preview)
  }

  // ===========================================================================
  // Rendering environment
  // ===========================================================================

  updateRendererConfig(config: RendererConfig): void {
    this.rendererConfig = config
  }

  updateCellDims(widthPx: number, heightPx: number): void {
    this.rendererConfig = {
      ...this.rendererConfig,
      cellWidthPx: widthPx,
      cellHeightPx: heightPx,
    }
  }

  currentRendererConfig(): RendererConfig {
    return this.rendererConfig
  }

  /**
   * Re-render every block whose rendering was made for another width.
   */
  reRenderIfNeeded(): void {
    const width = this.rendererConfig.terminalWidth
    for (const block of this.blocks) {
      if (!block.buffer.needsRender(width)) continue

      const rendered = this.renderWithCache(block.buffer, block.detection.formatId)
      if (Either.isRight(rendered)) {
        block.buffer.setRendered(rendered.right, width)
      }
    }
  }

  renderCache(): RenderCache {
    return this.cache
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private handleEmitted(block: ContentBlock | null): void {
    if (block !== null) this.handleBlock(block)
  }

  private handleBlock(content: ContentBlock): void {
    const range = rowRangeOf(content)

    if (this.config.honorSuppressionRanges && this.isSuppressed(range)) {
      logDebug('block suppressed', { rows: formatRange(range) })
      return
    }

    const detection = this.registry.detect(content)

    if (detection === null) {
      // Content under an existing block changed into something unrecognized
      const fingerprint = computeFingerprint(content.lines)
      const staleIdx = this.blocks.findIndex(
        (b) => rangesOverlap(b.rowRange, range) && b.fingerprint !== fingerprint
      )
      if (staleIdx >= 0) {
        logDebug('stale block removed', { rows: formatRange(this.blocks[staleIdx].rowRange) })
        this.blocks.splice(staleIdx, 1)
      }
      return
    }

    const buffer = new DualViewBuffer(content)
    const overlapping = this.blocks.filter((b) => rangesOverlap(b.rowRange, range))
    if (overlapping.some((b) => b.fingerprint === buffer.fingerprint)) {
      logDebug('unchanged block skipped', { rows: formatRange(range) })
      return
    }

    const rendered = this.renderWithCache(buffer, detection.formatId)
    if (Either.isLeft(rendered)) return

    buffer.setRendered(rendered.right, this.rendererConfig.terminalWidth)
    if (overlapping.length > 0) {
      this.blocks = this.blocks.filter((b) => !overlapping.includes(b))
    }

    const block = this.insertBlock(detection, buffer)
    logDebug('block detected', {
      id: block.blockId,
      format: detection.formatId,
      confidence: detection.confidence,
      rows: formatRange(range),
    })
  }

  private insertBlock(detection: DetectionResult, buffer: DualViewBuffer): PrettifiedBlock {
    const block = new PrettifiedBlock(makeBlockId(this.nextBlockId++), detection, buffer)
    const startRow = buffer.source.startRow

    let idx = this.blocks.length
    while (idx > 0 && this.blocks[idx - 1].content.startRow > startRow) {
      idx--
    }
    this.blocks.splice(idx, 0, block)

    this.evictExcessBlocks()
    return block
  }

  /**
   * Drop the lowest-row blocks beyond the cap, then forget suppression ranges
   * and collapse markers that lie entirely before the oldest survivor.
   */
  private evictExcessBlocks(): void {
    const excess = this.blocks.length - this.config.maxActiveBlocks
    if (excess <= 0) return

    this.blocks.splice(0, excess)
    const oldest = this.blocks[0]
    if (oldest === undefined) return

    const minRow = oldest.content.startRow
    this.suppressed = this.suppressed.filter((r) => r.end > minRow)
    this.claude.cleanupStaleEntries(minRow)
    logDebug('evicted blocks', { count: excess, minRow })
  }

  private renderWithCache(
    buffer: DualViewBuffer,
    formatId: string
  ): Either.Either<RenderedContent, RenderError> {
    const width = this.rendererConfig.terminalWidth
    const cached = this.cache.get(buffer.fingerprint, width, formatId)
    if (cached !== null) return Either.right(cached)

    const renderer = this.registry.getRenderer(formatId)
    const result: Either.Either<RenderedContent, RenderError> =
      renderer === null
        ? Either.left(new RendererNotFoundError({ formatId }))
        : renderer.render(buffer.source, this.rendererConfig)

    if (Either.isRight(result)) {
      this.cache.put(buffer.fingerprint, width, formatId, result.right)
    } else {
      logWarning('render failed', {
        format: formatId,
        rows: formatRange(rowRangeOf(buffer.source)),
        error: result.left._tag,
      })
    }
    return result
  }

  private extractContentBlock(range: RowRange): ContentBlock {
    const lines: string[] = []
    for (const block of this.blocks) {
      const content = block.content
      if (!rangesOverlap(block.rowRange, range)) continue

      const from = Math.max(0, range.start - content.startRow)
      const to = Math.min(range.end - content.startRow, content.lines.length)
      lines.push(...content.lines.slice(from, to))
    }

    return makeContentBlock({
      lines,
      startRow: range.start,
      endRow: range.end,
      timestamp: this.clock(),
    })
  }
}
