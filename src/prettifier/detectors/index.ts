/**
 * Built-in detectors, renderers and the default registry.
 */
import type { PrettifierConfig } from '../../effect/Config'
import { RendererRegistry } from '../registry'
import { DiffRenderer, JsonRenderer } from '../renderers'
import { parseUserRule, type DetectionRule } from '../rules'
import { createDiffDetector, DIFF_FORMAT_ID } from './diff'
import { createJsonDetector, JSON_FORMAT_ID } from './json'

export { createDiffDetector, DIFF_FORMAT_ID } from './diff'
export { createJsonDetector, JSON_FORMAT_ID } from './json'

const DIFF_PRIORITY = 60
const JSON_PRIORITY = 50

/**
 * Registry with the built-in formats and the user's rule adjustments.
 * Hosts may register further formats or replace a built-in renderer.
 */
export function createBuiltinRegistry(config: PrettifierConfig): RendererRegistry {
  const registry = new RendererRegistry(config.confidenceThreshold)
    .registerDetector(DIFF_PRIORITY, createDiffDetector())
    .registerDetector(JSON_PRIORITY, createJsonDetector())
    .registerRenderer(DIFF_FORMAT_ID, new DiffRenderer())
    .registerRenderer(JSON_FORMAT_ID, new JsonRenderer())

  for (const [formatId, rules] of Object.entries(config.detectionRules)) {
    const additional = rules.additional
      .map(parseUserRule)
      .filter((rule): rule is DetectionRule => rule !== null)
    registry.applyRulesForFormat(formatId, rules.overrides, additional)
  }

  return registry
}

export { DIFF_PRIORITY, JSON_PRIORITY }
