/**
 * Regex Detector - rule-weighted format detection
 */
import { QUICK_MATCH_LINES } from '../core/config'
import type { ConfigurableDetector } from './registry'
import type { DetectionRule, RuleOverride, RuleScope } from './rules'
import {
  firstLines,
  fullText,
  lastLines,
  type ContentBlock,
  type DetectionResult,
} from './types'

/**
 * Sums the weights of matching rules into a confidence (capped at 1.0).
 * With `definitiveShortCircuit`, the first matching definitive rule settles
 * detection at confidence 1.0.
 */
export class RegexDetector implements ConfigurableDetector {
  private ruleList: DetectionRule[]

  constructor(
    readonly formatId: string,
    readonly displayName: string,
    rules: readonly DetectionRule[],
    private readonly confidenceThreshold: number,
    private readonly minMatchingRules: number,
    private readonly definitiveShortCircuit: boolean
  ) {
    this.ruleList = rules.map((rule) => ({ ...rule }))
  }

  get rules(): readonly DetectionRule[] {
    return this.ruleList
  }

  detect(content: ContentBlock): DetectionResult | null {
    const text = fullText(content)
    let totalWeight = 0
    const matched: string[] = []

    for (const rule of this.ruleList) {
      if (!rule.enabled) continue

      if (rule.commandContext) {
        if (content.precedingCommand === null) continue
        if (!rule.commandContext.test(content.precedingCommand)) continue
      }

      if (!this.ruleMatches(rule, content, text)) continue

      totalWeight += rule.weight
      matched.push(rule.id)

      if (this.definitiveShortCircuit && rule.strength === 'definitive') {
        return {
          formatId: this.formatId,
          confidence: 1.0,
          matchedRules: [rule.id],
          source: 'HeuristicScan',
        }
      }
    }

    if (matched.length === 0 || matched.length < this.minMatchingRules) return null

    const confidence = Math.min(totalWeight, 1.0)
    if (confidence < this.confidenceThreshold) return null

    return {
      formatId: this.formatId,
      confidence,
      matchedRules: matched,
      source: 'HeuristicScan',
    }
  }

  /**
   * True when any enabled strong or definitive line-scoped rule hits one of
   * the sampled lines.
   */
  quickMatch(lines: readonly string[]): boolean {
    const sample = lines.slice(0, QUICK_MATCH_LINES)
    return this.ruleList.some(
      (rule) =>
        rule.enabled &&
        rule.strength !== 'supporting' &&
        (rule.scope.kind === 'any_line' || rule.scope.kind === 'first_lines') &&
        sample.some((line) => rule.pattern.test(line))
    )
  }

  applyOverrides(overrides: readonly RuleOverride[]): void {
    for (const override of overrides) {
      const rule = this.ruleList.find((r) => r.id === override.id)
      if (!rule) continue
      if (override.enabled !== undefined) rule.enabled = override.enabled
      if (override.weight !== undefined) rule.weight = override.weight
    }
  }

  /**
   * Rules with a known id replace the existing rule; others are appended.
   */
  mergeRules(rules: readonly DetectionRule[]): void {
    for (const rule of rules) {
      const idx = this.ruleList.findIndex((r) => r.id === rule.id)
      if (idx >= 0) {
        this.ruleList[idx] = { ...rule }
      } else {
        this.ruleList.push({ ...rule })
      }
    }
  }

  private ruleMatches(rule: DetectionRule, content: ContentBlock, text: string): boolean {
    switch (rule.scope.kind) {
      case 'full_block':
        return rule.pattern.test(text)
      case 'preceding_command':
        return content.precedingCommand !== null && rule.pattern.test(content.precedingCommand)
      default:
        return linesForScope(content, rule.scope).some((line) => rule.pattern.test(line))
    }
  }
}

function linesForScope(content: ContentBlock, scope: RuleScope): readonly string[] {
  switch (scope.kind) {
    case 'first_lines':
      return firstLines(content, scope.count)
    case 'last_lines':
      return lastLines(content, scope.count)
    default:
      return content.lines
  }
}

/**
 * Fluent construction of a RegexDetector.
 */
export class RegexDetectorBuilder {
  private rules: DetectionRule[] = []
  private threshold = 0.5
  private minRules = 1
  private shortCircuit = false

  constructor(
    private readonly formatId: string,
    private readonly displayName: string
  ) {}

  confidenceThreshold(threshold: number): this {
    this.threshold = threshold
    return this
  }

  minMatchingRules(count: number): this {
    this.minRules = count
    return this
  }

  definitiveRuleShortCircuit(enabled: boolean): this {
    this.shortCircuit = enabled
    return this
  }

  rule(rule: DetectionRule): this {
    this.rules.push(rule)
    return this
  }

  build(): RegexDetector {
    return new RegexDetector(
      this.formatId,
      this.displayName,
      this.rules,
      this.threshold,
      this.minRules,
      this.shortCircuit
    )
  }
}
