/**
 * Built-in JSON detection rules.
 * No single rule is definitive; confidence accumulates across signals.
 */
import { RegexDetectorBuilder, type RegexDetector } from '../regex-detector'
import {
  anyLine,
  builtInRule,
  firstLinesScope,
  lastLinesScope,
  precedingCommand,
} from '../rules'

export const JSON_FORMAT_ID = 'json'

export function createJsonDetector(): RegexDetector {
  return new RegexDetectorBuilder(JSON_FORMAT_ID, 'JSON')
    .confidenceThreshold(0.6)
    .minMatchingRules(1)
    .definitiveRuleShortCircuit(false)
    .rule(
      builtInRule({
        id: 'json_open_brace',
        pattern: /^\s*\{\s*$/,
        weight: 0.4,
        scope: firstLinesScope(3),
        strength: 'strong',
        description: 'Line containing only an opening brace {',
      })
    )
    .rule(
      builtInRule({
        id: 'json_open_bracket',
        pattern: /^\s*\[\s*$/,
        weight: 0.35,
        scope: firstLinesScope(3),
        strength: 'strong',
        description: 'Line containing only an opening bracket [',
      })
    )
    .rule(
      builtInRule({
        id: 'json_key_value',
        pattern: /^\s*"[^"]+"\s*:\s*/,
        weight: 0.3,
        scope: anyLine,
        strength: 'strong',
        description: 'JSON key-value pattern ("key": value)',
      })
    )
    .rule(
      builtInRule({
        id: 'json_close_brace',
        pattern: /^\s*\}\s*,?\s*$/,
        weight: 0.2,
        scope: lastLinesScope(3),
        strength: 'supporting',
        description: 'Line containing only a closing brace }',
      })
    )
    .rule(
      builtInRule({
        id: 'json_curl_context',
        pattern: /^(curl|http|httpie|wget)\s+/,
        weight: 0.3,
        scope: precedingCommand,
        strength: 'supporting',
        description: 'Preceding command is curl, http, httpie or wget',
      })
    )
    .rule(
      builtInRule({
        id: 'json_jq_context',
        pattern: /^(jq|gron|fx)\s+/,
        weight: 0.3,
        scope: precedingCommand,
        strength: 'supporting',
        description: 'Preceding command is jq, gron or fx',
      })
    )
    .build()
}
