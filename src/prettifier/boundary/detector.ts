/**
 * Boundary Detector - segments terminal output into content blocks
 */
import type { DetectionScope } from '../../effect/types'
import { logDebug } from '../log'
import { makeContentBlock, type ContentBlock } from '../types'
import { FenceTracker } from './fence'

export interface BoundaryConfig {
  /** When boundaries may fire */
  scope: DetectionScope
  /** Lines accumulated before a block is forced out */
  maxScanLines: number
  /** Inactivity window before `checkDebounce` emits */
  debounceMs: number
  /** Consecutive blank lines that end a block in `all` scope */
  blankLineThreshold: number
}

export const DEFAULT_BOUNDARY_CONFIG: BoundaryConfig = {
  scope: 'all',
  maxScanLines: 500,
  debounceMs: 100,
  blankLineThreshold: 2,
}

export type Clock = () => number

const isBlank = (line: string) => line.trim() === ''

/**
 * BoundaryDetector accumulates lines and emits a ContentBlock when a boundary
 * fires: command end, blank-line run, max lines, alt-screen or process change,
 * or the debounce timeout.
 *
 * - `command_output`: only lines between command start and end are kept
 * - `all`: every line is kept; blank-line runs and debounce end blocks
 * - `manual_only`: lines are kept but only `flush()` emits
 */
export class BoundaryDetector {
  private currentLines: string[] = []
  private currentCommand: string | null = null
  private blockStartRow = 0
  private lastOutputTime: number
  private inCommandOutput = false
  private consecutiveBlankLines = 0
  private fence = new FenceTracker()

  constructor(
    private readonly config: BoundaryConfig = DEFAULT_BOUNDARY_CONFIG,
    private readonly clock: Clock = Date.now
  ) {
    this.lastOutputTime = clock()
  }

  pushLine(line: string, row: number): ContentBlock | null {
    if (this.config.scope === 'command_output' && !this.inCommandOutput) {
      return null
    }

    this.lastOutputTime = this.clock()
    if (this.currentLines.length === 0) {
      this.blockStartRow = row
    }

    if (this.config.scope === 'manual_only') {
      this.currentLines.push(line)
      this.consecutiveBlankLines = 0
      return null
    }

    this.fence.update(line)

    if (this.config.scope === 'all' && isBlank(line) && !this.fence.inFence) {
      this.consecutiveBlankLines++
      if (this.consecutiveBlankLines >= this.config.blankLineThreshold) {
        logDebug('blank-line boundary', {
          row,
          blankLines: this.consecutiveBlankLines,
        })
        // The blank run itself is dropped, not carried into the next block
        const block = this.emitBlock()
        this.consecutiveBlankLines = 0
        return block
      }
      this.currentLines.push(line)
      return null
    }

    if (!this.fence.inFence) {
      this.consecutiveBlankLines = 0
    }
    this.currentLines.push(line)

    if (this.currentLines.length >= this.config.maxScanLines) {
      logDebug('max-scan-lines boundary', { row, lines: this.currentLines.length })
      return this.emitBlock()
    }

    return null
  }

  /**
   * Command start marker. Records the command and discards pre-command noise.
   */
  onCommandStart(command: string): void {
    this.currentCommand = command
    this.inCommandOutput = true
    this.currentLines = []
    this.consecutiveBlankLines = 0
  }

  onCommandEnd(): ContentBlock | null {
    this.inCommandOutput = false
    if (this.config.scope === 'manual_only') return null
    return this.emitBlock()
  }

  /**
   * Content on either side of an alt-screen switch is never merged.
   */
  onAltScreenChange(_entering: boolean): ContentBlock | null {
    if (this.config.scope === 'manual_only') return null
    return this.emitBlock()
  }

  onProcessChange(): ContentBlock | null {
    if (this.config.scope === 'manual_only') return null
    return this.emitBlock()
  }

  /**
   * Must be polled by the caller. Emits pending lines once `debounceMs`
   * has passed since the last accumulated line.
   */
  checkDebounce(): ContentBlock | null {
    if (this.config.scope === 'manual_only') return null
    if (this.currentLines.length === 0) return null

    const elapsed = this.clock() - this.lastOutputTime
    if (elapsed >= this.config.debounceMs) {
      logDebug('debounce boundary', { elapsed, pending: this.currentLines.length })
      return this.emitBlock()
    }
    return null
  }

  /** Force-emit regardless of scope */
  flush(): ContentBlock | null {
    return this.emitBlock()
  }

  scope(): DetectionScope {
    return this.config.scope
  }

  /** Discard accumulated, unemitted lines */
  reset(): void {
    this.currentLines = []
    this.currentCommand = null
    this.blockStartRow = 0
    this.inCommandOutput = false
    this.consecutiveBlankLines = 0
    this.fence.reset()
  }

  hasPendingLines(): boolean {
    return this.currentLines.length > 0
  }

  pendingLineCount(): number {
    return this.currentLines.length
  }

  /**
   * Build a block from the accumulator and clear it.
   * Trailing blank lines are trimmed; nothing is emitted for all-blank input.
   */
  private emitBlock(): ContentBlock | null {
    if (this.currentLines.length === 0) return null

    const lines = this.currentLines
    const command = this.currentCommand
    const startRow = this.blockStartRow
    this.currentLines = []
    this.currentCommand = null
    this.blockStartRow = 0
    this.consecutiveBlankLines = 0

    let end = lines.length
    while (end > 0 && isBlank(lines[end - 1])) end--
    if (end === 0) return null

    const kept = lines.slice(0, end)
    const block = makeContentBlock({
      lines: kept,
      startRow,
      endRow: startRow + kept.length,
      precedingCommand: command,
      timestamp: this.clock(),
    })
    logDebug('block emitted', {
      rows: `${block.startRow}..${block.endRow}`,
      lines: kept.length,
      command,
    })
    return block
  }
}
