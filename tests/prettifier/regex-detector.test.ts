import { describe, expect, it } from 'vitest'

import { RegexDetectorBuilder } from '../../src/prettifier/regex-detector'
import { RendererRegistry } from '../../src/prettifier/registry'
import {
  anyLine,
  builtInRule,
  firstLinesScope,
  fullBlock,
  lastLinesScope,
  parseRuleScope,
  parseUserRule,
  precedingCommand,
} from '../../src/prettifier/rules'
import { makeContentBlock } from '../../src/prettifier/types'

const block = (lines: readonly string[], precedingCommand: string | null = null) =>
  makeContentBlock({ lines, startRow: 0, precedingCommand, timestamp: 0 })

const braceRule = builtInRule({
  id: 'kv_brace',
  pattern: /^\{$/,
  weight: 0.4,
  scope: firstLinesScope(1),
  strength: 'strong',
  description: 'opening brace',
})

const keyRule = builtInRule({
  id: 'kv_key',
  pattern: /^\s*"\w+":/,
  weight: 0.3,
  scope: anyLine,
  strength: 'strong',
  description: 'quoted key',
})

const tailRule = builtInRule({
  id: 'kv_tail',
  pattern: /^\}$/,
  weight: 0.2,
  scope: lastLinesScope(1),
  strength: 'supporting',
  description: 'closing brace',
})

const kvDetector = () =>
  new RegexDetectorBuilder('kv', 'Key/Value')
    .confidenceThreshold(0.5)
    .rule(braceRule)
    .rule(keyRule)
    .rule(tailRule)
    .build()

describe('RegexDetector', () => {
  it('sums the weights of matching rules', () => {
    const result = kvDetector().detect(block(['{', '  "a": 1', '}']))

    expect(result?.formatId).toBe('kv')
    expect(result?.confidence).toBeCloseTo(0.9)
    expect(result?.matchedRules).toEqual(['kv_brace', 'kv_key', 'kv_tail'])
    expect(result?.source).toBe('HeuristicScan')
  })

  it('returns nothing below its own threshold', () => {
    expect(kvDetector().detect(block(['"a": 1']))).toBeNull()
  })

  it('restricts first-lines rules to the head of the block', () => {
    const result = kvDetector().detect(block(['x', '{', '"a": 1', '}']))
    expect(result?.matchedRules).toEqual(['kv_key', 'kv_tail'])
  })

  it('requires the minimum number of matching rules', () => {
    const detector = new RegexDetectorBuilder('kv', 'Key/Value')
      .confidenceThreshold(0)
      .minMatchingRules(2)
      .rule(braceRule)
      .rule(keyRule)
      .build()

    expect(detector.detect(block(['{']))).toBeNull()
    expect(detector.detect(block(['{', '"a": 1']))?.matchedRules).toEqual(['kv_brace', 'kv_key'])
  })

  it('settles on the first definitive rule when short-circuiting', () => {
    const supporting = builtInRule({
      id: 'sup',
      pattern: /^x/,
      weight: 0.1,
      scope: anyLine,
      strength: 'supporting',
      description: '',
    })
    const definitive = builtInRule({
      id: 'def',
      pattern: /^DEF/,
      weight: 0.2,
      scope: anyLine,
      strength: 'definitive',
      description: '',
    })

    const shortCircuit = new RegexDetectorBuilder('d', 'D')
      .confidenceThreshold(0.2)
      .definitiveRuleShortCircuit(true)
      .rule(supporting)
      .rule(definitive)
      .build()
    const result = shortCircuit.detect(block(['x', 'DEF']))
    expect(result?.confidence).toBe(1.0)
    expect(result?.matchedRules).toEqual(['def'])

    const summing = new RegexDetectorBuilder('d', 'D')
      .confidenceThreshold(0.2)
      .rule(supporting)
      .rule(definitive)
      .build()
    const summed = summing.detect(block(['x', 'DEF']))
    expect(summed?.confidence).toBeCloseTo(0.3)
    expect(summed?.matchedRules).toEqual(['sup', 'def'])
  })

  it('matches full-block rules across lines', () => {
    const detector = new RegexDetectorBuilder('pair', 'Pair')
      .rule(
        builtInRule({
          id: 'pair',
          pattern: /a\nb/,
          weight: 0.6,
          scope: fullBlock,
          strength: 'strong',
          description: '',
        })
      )
      .build()

    expect(detector.detect(block(['a', 'b']))?.confidence).toBe(0.6)
    expect(detector.detect(block(['a', 'c']))).toBeNull()
  })

  it('matches preceding-command rules only when a command exists', () => {
    const detector = new RegexDetectorBuilder('http', 'HTTP')
      .rule(
        builtInRule({
          id: 'curl',
          pattern: /^curl\s/,
          weight: 0.6,
          scope: precedingCommand,
          strength: 'supporting',
          description: '',
        })
      )
      .build()

    expect(detector.detect(block(['body'], 'curl example.test'))?.matchedRules).toEqual(['curl'])
    expect(detector.detect(block(['body']))).toBeNull()
  })

  it('gates rules on their command context', () => {
    const detector = new RegexDetectorBuilder('adds', 'Adds')
      .rule(
        builtInRule({
          id: 'plus',
          pattern: /^\+/,
          weight: 0.6,
          scope: anyLine,
          strength: 'strong',
          commandContext: /^git/,
          description: '',
        })
      )
      .build()

    expect(detector.detect(block(['+a'], 'git diff'))).not.toBeNull()
    expect(detector.detect(block(['+a'], 'ls'))).toBeNull()
    expect(detector.detect(block(['+a']))).toBeNull()
  })

  describe('quickMatch', () => {
    it('uses strong line-scoped rules', () => {
      expect(kvDetector().quickMatch(['  "a": 1'])).toBe(true)
      expect(kvDetector().quickMatch(['plain'])).toBe(false)
    })

    it('ignores supporting rules', () => {
      expect(kvDetector().quickMatch(['}'])).toBe(false)
    })
  })

  describe('rule configuration', () => {
    it('applies overrides by rule id', () => {
      const detector = kvDetector()
      detector.applyOverrides([
        { id: 'kv_brace', enabled: false },
        { id: 'kv_key', weight: 0.6 },
        { id: 'unknown', enabled: false },
      ])

      const result = detector.detect(block(['{', '"a": 1', '}']))
      expect(result?.matchedRules).toEqual(['kv_key', 'kv_tail'])
      expect(result?.confidence).toBeCloseTo(0.8)
    })

    it('does not mutate the rules it was built from', () => {
      const detector = kvDetector()
      detector.applyOverrides([{ id: 'kv_brace', enabled: false }])
      expect(braceRule.enabled).toBe(true)
    })

    it('replaces known rules and appends new ones', () => {
      const detector = kvDetector()
      detector.mergeRules([
        { ...tailRule, weight: 0.5 },
        { ...keyRule, id: 'kv_extra' },
      ])

      expect(detector.rules.map((r) => r.id)).toEqual(['kv_brace', 'kv_key', 'kv_tail', 'kv_extra'])
      expect(detector.rules[2].weight).toBe(0.5)
    })

    it('is reachable through the registry', () => {
      const registry = new RendererRegistry(0.5).registerDetector(10, kvDetector())
      expect(registry.applyRulesForFormat('kv', [{ id: 'kv_key', enabled: false }], [])).toBe(true)
      expect(registry.detect(block(['"a": 1', '"b": 2']))).toBeNull()
    })
  })
})

describe('parseRuleScope', () => {
  it('parses counted scopes', () => {
    expect(parseRuleScope('first_lines:7')).toEqual({ kind: 'first_lines', count: 7 })
    expect(parseRuleScope('last_lines:2')).toEqual({ kind: 'last_lines', count: 2 })
  })

  it('falls back to default counts', () => {
    expect(parseRuleScope('first_lines:x')).toEqual({ kind: 'first_lines', count: 5 })
    expect(parseRuleScope('last_lines:0')).toEqual({ kind: 'last_lines', count: 3 })
  })

  it('parses plain scopes and defaults to any line', () => {
    expect(parseRuleScope('full_block')).toEqual({ kind: 'full_block' })
    expect(parseRuleScope('preceding_command')).toEqual({ kind: 'preceding_command' })
    expect(parseRuleScope('sideways')).toEqual({ kind: 'any_line' })
  })
})

describe('parseUserRule', () => {
  const input = {
    id: 'user_null',
    pattern: '^null$',
    weight: 0.7,
    scope: 'last_lines:1',
    description: 'bare null',
    enabled: true,
  }

  it('builds a supporting user-defined rule', () => {
    const rule = parseUserRule(input)
    expect(rule?.strength).toBe('supporting')
    expect(rule?.source).toBe('user_defined')
    expect(rule?.scope).toEqual({ kind: 'last_lines', count: 1 })
    expect(rule?.pattern.test('null')).toBe(true)
  })

  it('skips invalid patterns', () => {
    expect(parseUserRule({ ...input, pattern: '(' })).toBeNull()
  })
})
