/**
 * Branded types for type-safe identifiers and domain primitives.
 * These prevent mixing values that have the same underlying type.
 */
import { Schema } from "effect"

// =============================================================================
// Entity IDs
// =============================================================================

/** Unique, never reused identifier for a prettified block */
export const BlockId = Schema.Int.pipe(
  Schema.nonNegative(),
  Schema.brand("BlockId")
)
export type BlockId = typeof BlockId.Type

/** Identifier for a tracked collapse marker of an external tool session */
export const CollapseId = Schema.Int.pipe(
  Schema.nonNegative(),
  Schema.brand("CollapseId")
)
export type CollapseId = typeof CollapseId.Type

/** Content fingerprint derived from a block's line sequence */
export const Fingerprint = Schema.String.pipe(Schema.brand("Fingerprint"))
export type Fingerprint = typeof Fingerprint.Type

// =============================================================================
// Detection Types
// =============================================================================

/** When the boundary detector is allowed to emit blocks */
export const DetectionScope = Schema.Literal("command_output", "all", "manual_only")
export type DetectionScope = typeof DetectionScope.Type

/** How a detection result came about */
export const DetectionSource = Schema.Literal(
  "HeuristicScan",
  "TriggerInvoked",
  "ExpansionReplay"
)
export type DetectionSource = typeof DetectionSource.Type

/** Which representation of a block is displayed */
export const ViewMode = Schema.Literal("rendered", "source")
export type ViewMode = typeof ViewMode.Type

// =============================================================================
// ID Generation Helpers
// =============================================================================

/** Generate a BlockId from the pipeline counter */
export const makeBlockId = (counter: number): BlockId => BlockId.make(counter)

/** Generate a CollapseId from the integration counter */
export const makeCollapseId = (counter: number): CollapseId =>
  CollapseId.make(counter)
