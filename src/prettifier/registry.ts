/**
 * Format registry: detectors and renderers by format id.
 */
import type { Either } from 'effect'
import { QUICK_MATCH_LINES } from '../core/config'
import type { RenderError } from '../effect/errors'
import { logDebug } from './log'
import type { DetectionRule, RuleOverride } from './rules'
import {
  firstLines,
  type ContentBlock,
  type DetectionResult,
  type RenderedContent,
  type RendererConfig,
} from './types'

// =============================================================================
// Capability Interfaces
// =============================================================================

/**
 * Decides whether a block matches one format.
 */
export interface ContentDetector {
  readonly formatId: string
  readonly displayName: string
  /** Full detection; null when the detector cannot handle the content */
  detect(content: ContentBlock): DetectionResult | null
  /** Cheap pre-filter over the first lines of a block */
  quickMatch(lines: readonly string[]): boolean
}

/**
 * A detector whose rules can be adjusted from user config.
 */
export interface ConfigurableDetector extends ContentDetector {
  readonly rules: readonly DetectionRule[]
  applyOverrides(overrides: readonly RuleOverride[]): void
  mergeRules(rules: readonly DetectionRule[]): void
}

export function isConfigurable(detector: ContentDetector): detector is ConfigurableDetector {
  return 'applyOverrides' in detector && 'mergeRules' in detector
}

/**
 * Turns a block into styled lines. Failure is a value, never a throw.
 */
export interface ContentRenderer {
  readonly formatId: string
  readonly displayName: string
  /** Gutter badge, e.g. "JSON" */
  readonly formatBadge: string
  render(
    content: ContentBlock,
    config: RendererConfig
  ): Either.Either<RenderedContent, RenderError>
}

// =============================================================================
// Registry
// =============================================================================

interface RegisteredDetector {
  priority: number
  detector: ContentDetector
}

/**
 * Detectors are kept in descending priority, FIFO within a priority.
 * Detection keeps the highest confidence; ties go to the earlier detector.
 */
export class RendererRegistry {
  private detectors: RegisteredDetector[] = []
  private renderers = new Map<string, ContentRenderer>()

  constructor(private threshold: number) {}

  registerDetector(priority: number, detector: ContentDetector): this {
    let idx = 0
    while (idx < this.detectors.length && this.detectors[idx].priority >= priority) {
      idx++
    }
    this.detectors.splice(idx, 0, { priority, detector })
    return this
  }

  registerRenderer(formatId: string, renderer: ContentRenderer): this {
    this.renderers.set(formatId, renderer)
    return this
  }

  getRenderer(formatId: string): ContentRenderer | null {
    return this.renderers.get(formatId) ?? null
  }

  /**
   * Best detection at or above the confidence threshold, or null.
   */
  detect(content: ContentBlock): DetectionResult | null {
    const sample = firstLines(content, QUICK_MATCH_LINES)
    let best: DetectionResult | null = null

    for (const { detector } of this.detectors) {
      if (!detector.quickMatch(sample)) continue

      const result = detector.detect(content)
      if (result && (best === null || result.confidence > best.confidence)) {
        best = result
      }
    }

    if (best === null || best.confidence < this.threshold) {
      logDebug('no format met threshold', {
        rows: `${content.startRow}..${content.endRow}`,
        threshold: this.threshold,
        best: best?.formatId,
      })
      return null
    }
    return best
  }

  setConfidenceThreshold(threshold: number): void {
    this.threshold = threshold
  }

  get confidenceThreshold(): number {
    return this.threshold
  }

  registeredFormats(): Array<{ formatId: string; displayName: string }> {
    return [...this.renderers.entries()].map(([formatId, renderer]) => ({
      formatId,
      displayName: renderer.displayName,
    }))
  }

  get detectorCount(): number {
    return this.detectors.length
  }

  get rendererCount(): number {
    return this.renderers.size
  }

  /**
   * Apply user rule overrides and extra rules to the detector for a format.
   * Returns false when no configurable detector exists for it.
   */
  applyRulesForFormat(
    formatId: string,
    overrides: readonly RuleOverride[],
    additional: readonly DetectionRule[]
  ): boolean {
    const entry = this.detectors.find(({ detector }) => detector.formatId === formatId)
    if (!entry || !isConfigurable(entry.detector)) return false

    if (overrides.length > 0) entry.detector.applyOverrides(overrides)
    if (additional.length > 0) entry.detector.mergeRules(additional)
    return true
  }
}
