/**
 * Claude Code session integration: session detection and tracking of the
 * tool's collapsed ("ctrl+o to expand") output regions.
 */
import { Data } from 'effect'
import type { RowRange } from '../core/row-range'
import type { ClaudeCodeSettings } from '../effect/Config'
import { makeCollapseId, type CollapseId } from '../effect/types'
import { DIFF_FORMAT_ID } from './detectors/diff'
import { logDebug } from './log'
import type { ContentBlock, DetectionResult } from './types'

// =============================================================================
// Types
// =============================================================================

export interface RenderedPreview {
  readonly formatBadge: string
  readonly firstHeader: string | null
  readonly contentSummary: string
}

export type ExpandState = Data.TaggedEnum<{
  Collapsed: { readonly preview: RenderedPreview | null }
  Expanded: { readonly prettified: boolean }
}>
export const ExpandState = Data.taggedEnum<ExpandState>()

export type ClaudeCodeEvent = Data.TaggedEnum<{
  ContentExpanded: { readonly range: RowRange }
  ContentCollapsed: { readonly range: RowRange }
}>
export const ClaudeCodeEvent = Data.taggedEnum<ClaudeCodeEvent>()

export type SessionEnv = Readonly<Record<string, string | undefined>>

const SESSION_ENV_KEY = 'CLAUDE_CODE'
const MARKDOWN_FORMAT_ID = 'markdown'

const FORMAT_BADGES: Readonly<Record<string, string>> = {
  markdown: 'MD Markdown',
  json: '{} JSON',
  diagrams: 'Diagram',
  yaml: 'YAML',
  diff: '± Diff',
}

const isCollapseMarker = (line: string): boolean => line.toLowerCase().includes('ctrl+o')

// =============================================================================
// Integration
// =============================================================================

export class ClaudeCodeIntegration {
  private active = false
  private states = new Map<CollapseId, ExpandState>()
  private rowToCollapse = new Map<number, CollapseId>()
  private nextCollapseId = 0

  constructor(private readonly settings: ClaudeCodeSettings) {}

  isActive(): boolean {
    return this.active
  }

  config(): ClaudeCodeSettings {
    return this.settings
  }

  /**
   * Detect a session from the environment or the foreground process name.
   * Always false when auto-detection is off.
   */
  detectSession(env: SessionEnv, processName: string): boolean {
    if (!this.settings.autoDetect) return false

    if (env[SESSION_ENV_KEY] !== undefined || processName.toLowerCase().includes('claude')) {
      this.active = true
      logDebug('claude code session detected', { processName })
      return true
    }
    return false
  }

  /** Whether expanded content detected as `formatId` may be rendered */
  rendersFormat(formatId: string): boolean {
    if (formatId === MARKDOWN_FORMAT_ID) return this.settings.renderMarkdown
    if (formatId === DIFF_FORMAT_ID) return this.settings.renderDiffs
    return true
  }

  /** Mark the session active from output heuristics */
  markActive(): void {
    this.active = true
  }

  /**
   * Track a collapse marker line. Only active sessions produce events.
   */
  processLine(line: string, row: number): ClaudeCodeEvent | null {
    if (!this.active || !isCollapseMarker(line)) return null

    const id = makeCollapseId(this.nextCollapseId++)
    this.states.set(id, ExpandState.Collapsed({ preview: null }))
    this.rowToCollapse.set(row, id)

    return ClaudeCodeEvent.ContentCollapsed({ range: { start: row, end: row + 1 } })
  }

  onExpand(id: CollapseId, range: RowRange): ClaudeCodeEvent | null {
    if (!this.states.has(id)) return null
    this.states.set(id, ExpandState.Expanded({ prettified: false }))
    return ClaudeCodeEvent.ContentExpanded({ range })
  }

  onCollapse(
    id: CollapseId,
    range: RowRange,
    preview: RenderedPreview | null = null
  ): ClaudeCodeEvent | null {
    if (!this.states.has(id)) return null
    this.states.set(id, ExpandState.Collapsed({ preview }))
    return ClaudeCodeEvent.ContentCollapsed({ range })
  }

  /** Record that expanded content was prettified; ignored unless expanded */
  markPrettified(id: CollapseId): void {
    const state = this.states.get(id)
    if (state?._tag === 'Expanded') {
      this.states.set(id, ExpandState.Expanded({ prettified: true }))
    }
  }

  isCollapsed(row: number): boolean {
    const id = this.rowToCollapse.get(row)
    if (id === undefined) return false
    return this.states.get(id)?._tag === 'Collapsed'
  }

  collapseIdAtRow(row: number): CollapseId | null {
    return this.rowToCollapse.get(row) ?? null
  }

  getState(id: CollapseId): ExpandState | null {
    return this.states.get(id) ?? null
  }

  getPreview(id: CollapseId): RenderedPreview | null {
    const state = this.states.get(id)
    return state?._tag === 'Collapsed' ? state.preview : null
  }

  /**
   * Drop markers on rows below `minRow` and the states they refer to.
   */
  cleanupStaleEntries(minRow: number): void {
    for (const [row, id] of [...this.rowToCollapse]) {
      if (row < minRow) {
        this.rowToCollapse.delete(row)
        this.states.delete(id)
      }
    }
  }

  static generatePreview(
    content: ContentBlock,
    detection: DetectionResult,
    showBadges: boolean
  ): RenderedPreview {
    const formatBadge = showBadges
      ? (FORMAT_BADGES[detection.formatId] ?? detection.formatId)
      : ''

    const header = content.lines.find((line) => line.startsWith('#'))

    return {
      formatBadge,
      firstHeader: header === undefined ? null : header.replace(/^#+/, '').trim(),
      contentSummary: `${content.lines.length} lines`,
    }
  }
}
