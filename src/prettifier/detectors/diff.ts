/**
 * Built-in unified diff detection rules.
 * `diff --git` headers, `---`/`+++` pairs and hunk headers settle detection alone.
 */
import { RegexDetectorBuilder, type RegexDetector } from '../regex-detector'
import {
  anyLine,
  builtInRule,
  firstLinesScope,
  fullBlock,
  precedingCommand,
} from '../rules'

export const DIFF_FORMAT_ID = 'diff'

export function createDiffDetector(): RegexDetector {
  return new RegexDetectorBuilder(DIFF_FORMAT_ID, 'Diff')
    .confidenceThreshold(0.6)
    .minMatchingRules(1)
    .definitiveRuleShortCircuit(true)
    .rule(
      builtInRule({
        id: 'diff_git_header',
        pattern: /^diff --git\s+/,
        weight: 0.9,
        scope: firstLinesScope(5),
        strength: 'definitive',
        description: 'diff --git header at start of output',
      })
    )
    .rule(
      builtInRule({
        id: 'diff_unified_header',
        pattern: /^---\s+\S+.*\n\+\+\+\s+\S+/,
        weight: 0.9,
        scope: fullBlock,
        strength: 'definitive',
        description: 'Unified diff --- / +++ file header pair',
      })
    )
    .rule(
      builtInRule({
        id: 'diff_hunk',
        pattern: /^@@\s+-\d+,?\d*\s+\+\d+,?\d*\s+@@/,
        weight: 0.8,
        scope: anyLine,
        strength: 'definitive',
        description: '@@ hunk header with line ranges',
      })
    )
    .rule(
      builtInRule({
        id: 'diff_add_line',
        pattern: /^\+[^+]/,
        weight: 0.1,
        scope: anyLine,
        strength: 'supporting',
        description: 'Added line starting with +',
      })
    )
    .rule(
      builtInRule({
        id: 'diff_remove_line',
        pattern: /^-[^-]/,
        weight: 0.1,
        scope: anyLine,
        strength: 'supporting',
        description: 'Removed line starting with -',
      })
    )
    .rule(
      builtInRule({
        id: 'diff_git_context',
        pattern: /^git\s+(diff|log|show)/,
        weight: 0.3,
        scope: precedingCommand,
        strength: 'supporting',
        description: 'Preceding command is git diff, log or show',
      })
    )
    .build()
}
