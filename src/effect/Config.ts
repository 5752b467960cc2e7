/**
 * Prettifier configuration schema and the settings service.
 * Every field has a default, so decoding `{}` yields the default config.
 */
import { Context, Effect, Either, Layer, ParseResult, Schema } from "effect"
import {
  DEFAULT_BLANK_LINE_THRESHOLD,
  DEFAULT_CACHE_SIZE,
  MAX_ACTIVE_BLOCKS,
} from "../core/config"
import { ConfigDecodeError } from "./errors"
import { DetectionScope } from "./types"

// =============================================================================
// Sub-configs
// =============================================================================

export const ClaudeCodeSettings = Schema.Struct({
  /** Detect sessions from environment and process name */
  autoDetect: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  renderMarkdown: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  renderDiffs: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  /** Re-run detection when the tool expands collapsed content */
  autoRenderOnExpand: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  showFormatBadges: Schema.optionalWith(Schema.Boolean, { default: () => true }),
})
export type ClaudeCodeSettings = typeof ClaudeCodeSettings.Type

export const RuleOverrideSettings = Schema.Struct({
  id: Schema.String,
  enabled: Schema.optional(Schema.Boolean),
  weight: Schema.optional(Schema.Number.pipe(Schema.between(0, 1))),
})
export type RuleOverrideSettings = typeof RuleOverrideSettings.Type

export const UserRuleSettings = Schema.Struct({
  id: Schema.String,
  pattern: Schema.String,
  weight: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 1)), {
    default: () => 0.3,
  }),
  /** `any_line`, `first_lines:N`, `last_lines:N`, `full_block` or `preceding_command` */
  scope: Schema.optionalWith(Schema.String, { default: () => "any_line" }),
  description: Schema.optionalWith(Schema.String, { default: () => "" }),
  enabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
})
export type UserRuleSettings = typeof UserRuleSettings.Type

export const FormatRulesSettings = Schema.Struct({
  overrides: Schema.optionalWith(Schema.Array(RuleOverrideSettings), {
    default: () => [],
  }),
  additional: Schema.optionalWith(Schema.Array(UserRuleSettings), {
    default: () => [],
  }),
})
export type FormatRulesSettings = typeof FormatRulesSettings.Type

// =============================================================================
// PrettifierConfig
// =============================================================================

const PositiveInt = Schema.Int.pipe(Schema.greaterThan(0))
const NonNegativeInt = Schema.Int.pipe(Schema.nonNegative())

export const PrettifierConfig = Schema.Struct({
  enabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  detectionScope: Schema.optionalWith(DetectionScope, { default: () => "all" as const }),
  /** Minimum confidence (0..1) for an automatic detection */
  confidenceThreshold: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 1)), {
    default: () => 0.6,
  }),
  maxScanLines: Schema.optionalWith(PositiveInt, { default: () => 500 }),
  debounceMs: Schema.optionalWith(NonNegativeInt, { default: () => 100 }),
  blankLineThreshold: Schema.optionalWith(PositiveInt, {
    default: () => DEFAULT_BLANK_LINE_THRESHOLD,
  }),
  /** When false, suppression ranges are recorded but never block detection */
  honorSuppressionRanges: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  cacheMaxEntries: Schema.optionalWith(PositiveInt, { default: () => DEFAULT_CACHE_SIZE }),
  maxActiveBlocks: Schema.optionalWith(PositiveInt, { default: () => MAX_ACTIVE_BLOCKS }),
  claudeCode: Schema.optionalWith(ClaudeCodeSettings, {
    default: () => Schema.decodeSync(ClaudeCodeSettings)({}),
  }),
  /** Rule overrides and extra rules keyed by format id */
  detectionRules: Schema.optionalWith(
    Schema.Record({ key: Schema.String, value: FormatRulesSettings }),
    { default: () => ({}) }
  ),
})
export type PrettifierConfig = typeof PrettifierConfig.Type
export type PrettifierConfigInput = typeof PrettifierConfig.Encoded

/**
 * Decode untrusted input (e.g. a parsed settings file).
 */
export const decodePrettifierConfig = (
  input: unknown
): Either.Either<PrettifierConfig, ConfigDecodeError> =>
  Schema.decodeUnknownEither(PrettifierConfig)(input).pipe(
    Either.mapLeft(
      (error) =>
        new ConfigDecodeError({
          message: ParseResult.TreeFormatter.formatErrorSync(error),
        })
    )
  )

export const makePrettifierConfig = (
  input: PrettifierConfigInput = {}
): PrettifierConfig => Schema.decodeSync(PrettifierConfig)(input)

export const DEFAULT_PRETTIFIER_CONFIG: PrettifierConfig = makePrettifierConfig()

// =============================================================================
// PrettifierSettings Service
// =============================================================================

export class PrettifierSettings extends Context.Tag("@terminal-prettifier/PrettifierSettings")<
  PrettifierSettings,
  PrettifierConfig
>() {
  /** Default configuration */
  static readonly layer = Layer.succeed(PrettifierSettings, DEFAULT_PRETTIFIER_CONFIG)

  /** Configuration decoded from untrusted input */
  static readonly fromInput = (input: unknown) =>
    Layer.effect(
      PrettifierSettings,
      Effect.gen(function* () {
        return yield* decodePrettifierConfig(input)
      })
    )
}
