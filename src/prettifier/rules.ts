/**
 * Detection rules: weighted regex signals scoped to part of a block.
 */
import { logWarning } from './log'

export type RuleScope =
  | { readonly kind: 'any_line' }
  | { readonly kind: 'first_lines'; readonly count: number }
  | { readonly kind: 'last_lines'; readonly count: number }
  | { readonly kind: 'full_block' }
  | { readonly kind: 'preceding_command' }

/**
 * `definitive` rules can settle detection alone, `strong` rules take part in
 * quick matching, `supporting` rules only add weight.
 */
export type RuleStrength = 'strong' | 'supporting' | 'definitive'

export type RuleSource = 'built_in' | 'user_defined'

export interface DetectionRule {
  id: string
  pattern: RegExp
  weight: number
  scope: RuleScope
  strength: RuleStrength
  source: RuleSource
  /** Rule only applies when the preceding command matches */
  commandContext: RegExp | null
  description: string
  enabled: boolean
}

export interface RuleOverride {
  readonly id: string
  readonly enabled?: boolean
  readonly weight?: number
}

export const anyLine: RuleScope = { kind: 'any_line' }
export const fullBlock: RuleScope = { kind: 'full_block' }
export const precedingCommand: RuleScope = { kind: 'preceding_command' }
export const firstLinesScope = (count: number): RuleScope => ({ kind: 'first_lines', count })
export const lastLinesScope = (count: number): RuleScope => ({ kind: 'last_lines', count })

export function builtInRule(
  rule: Omit<DetectionRule, 'source' | 'commandContext' | 'enabled'> &
    Partial<Pick<DetectionRule, 'commandContext' | 'enabled'>>
): DetectionRule {
  return {
    commandContext: null,
    enabled: true,
    ...rule,
    source: 'built_in',
  }
}

const parseCount = (value: string, fallback: number): number => {
  const n = Number.parseInt(value, 10)
  return Number.isFinite(n) && n > 0 ? n : fallback
}

/**
 * Parse a config scope string: `any_line`, `first_lines:N`, `last_lines:N`,
 * `full_block` or `preceding_command`. Unknown values mean `any_line`.
 */
export function parseRuleScope(scope: string): RuleScope {
  if (scope.startsWith('first_lines:')) {
    return firstLinesScope(parseCount(scope.slice('first_lines:'.length), 5))
  }
  if (scope.startsWith('last_lines:')) {
    return lastLinesScope(parseCount(scope.slice('last_lines:'.length), 3))
  }
  switch (scope) {
    case 'full_block':
      return fullBlock
    case 'preceding_command':
      return precedingCommand
    default:
      return anyLine
  }
}

export interface UserRuleInput {
  readonly id: string
  readonly pattern: string
  readonly weight: number
  readonly scope: string
  readonly description: string
  readonly enabled: boolean
}

/**
 * Build a supporting rule from user config. Invalid patterns are skipped.
 */
export function parseUserRule(input: UserRuleInput): DetectionRule | null {
  let pattern: RegExp
  try {
    pattern = new RegExp(input.pattern)
  } catch (error) {
    logWarning('invalid user detection rule skipped', {
      rule: input.id,
      pattern: input.pattern,
      error: String(error),
    })
    return null
  }

  return {
    id: input.id,
    pattern,
    weight: input.weight,
    scope: parseRuleScope(input.scope),
    strength: 'supporting',
    source: 'user_defined',
    commandContext: null,
    description: input.description,
    enabled: input.enabled,
  }
}
