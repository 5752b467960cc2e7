/**
 * Prettifier service: one pipeline behind an Effect interface.
 */
import { Context, Effect, Layer, Option } from "effect"
import type { RowRange } from "../../core/row-range"
import { createBuiltinRegistry } from "../../prettifier/detectors"
import type { SessionEnv, ClaudeCodeEvent } from "../../prettifier/claude-code"
import { PrettifierPipeline, type RowLine } from "../../prettifier/pipeline/pipeline"
import type { PrettifiedBlock } from "../../prettifier/pipeline/block"
import type { RendererRegistry } from "../../prettifier/registry"
import type { CacheStats } from "../../prettifier/render-cache"
import type { ContentBlock, RendererConfig } from "../../prettifier/types"
import { PrettifierSettings } from "../Config"
import type { BlockId, DetectionScope } from "../types"

// =============================================================================
// FormatRegistry Service
// =============================================================================

export class FormatRegistry extends Context.Tag("@terminal-prettifier/FormatRegistry")<
  FormatRegistry,
  RendererRegistry
>() {
  /** Built-in detectors with the configured rule adjustments */
  static readonly builtin = Layer.effect(
    FormatRegistry,
    Effect.map(PrettifierSettings, createBuiltinRegistry)
  )

  static readonly fromRegistry = (registry: RendererRegistry) =>
    Layer.succeed(FormatRegistry, registry)
}

// =============================================================================
// Prettifier Service
// =============================================================================

export class Prettifier extends Context.Tag("@terminal-prettifier/Prettifier")<
  Prettifier,
  {
    /** Feed one line of terminal output */
    readonly processOutput: (line: string, row: number) => Effect.Effect<void>

    readonly onCommandStart: (command: string) => Effect.Effect<void>
    readonly onCommandEnd: () => Effect.Effect<void>
    readonly onAltScreenChange: (entering: boolean) => Effect.Effect<void>
    readonly onProcessChange: () => Effect.Effect<void>
    readonly flush: () => Effect.Effect<void>

    /** Detect a complete command output read from scrollback */
    readonly submitCommandOutput: (
      lines: readonly RowLine[],
      command: string | null
    ) => Effect.Effect<void>

    /** Force content to a format, skipping detection */
    readonly triggerPrettify: (
      formatId: string,
      content: ContentBlock
    ) => Effect.Effect<BlockId>

    readonly toggleGlobal: () => Effect.Effect<boolean>
    readonly isEnabled: () => Effect.Effect<boolean>
    readonly toggleBlock: (blockId: BlockId) => Effect.Effect<boolean>

    readonly blockAtRow: (row: number) => Effect.Effect<Option.Option<PrettifiedBlock>>
    readonly activeBlocks: () => Effect.Effect<readonly PrettifiedBlock[]>

    readonly suppressDetection: (range: RowRange) => Effect.Effect<void>
    readonly isSuppressed: (range: RowRange) => Effect.Effect<boolean>

    readonly updateRendererConfig: (config: RendererConfig) => Effect.Effect<void>
    readonly updateCellDims: (widthPx: number, heightPx: number) => Effect.Effect<void>
    readonly reRenderIfNeeded: () => Effect.Effect<void>

    readonly resetBoundary: () => Effect.Effect<void>
    readonly clearBlocks: () => Effect.Effect<void>
    readonly detectionScope: () => Effect.Effect<DetectionScope>
    readonly cacheStats: () => Effect.Effect<CacheStats>

    readonly detectClaudeCodeSession: (
      env: SessionEnv,
      processName: string
    ) => Effect.Effect<boolean>
    readonly markClaudeCodeActive: () => Effect.Effect<void>
    readonly processClaudeCodeLine: (
      line: string,
      row: number
    ) => Effect.Effect<Option.Option<ClaudeCodeEvent>>
    readonly onClaudeCodeExpand: (range: RowRange) => Effect.Effect<void>
    readonly onClaudeCodeCollapse: (
      range: RowRange
    ) => Effect.Effect<Option.Option<ClaudeCodeEvent>>

    /** Periodic work for the UI tick: debounce, then width re-renders */
    readonly tick: () => Effect.Effect<void>
  }
>() {
  /** Production layer */
  static readonly layer = Layer.effect(
    Prettifier,
    Effect.gen(function* () {
      const settings = yield* PrettifierSettings
      const registry = yield* FormatRegistry
      const pipeline = new PrettifierPipeline(settings, registry)

      yield* Effect.logDebug("prettifier pipeline created").pipe(
        Effect.annotateLogs({
          scope: settings.detectionScope,
          detectors: registry.detectorCount,
          renderers: registry.rendererCount,
        })
      )

      const toggleGlobal = Effect.fn("Prettifier.toggleGlobal")(function* () {
        pipeline.toggleGlobal()
        const enabled = pipeline.isEnabled()
        yield* Effect.logInfo(`prettifier ${enabled ? "enabled" : "disabled"}`)
        return enabled
      })

      const tick = Effect.fn("Prettifier.tick")(function* () {
        yield* Effect.sync(() => pipeline.checkDebounce())
        yield* Effect.sync(() => pipeline.reRenderIfNeeded())
      })

      return Prettifier.of({
        processOutput: (line, row) => Effect.sync(() => pipeline.processOutput(line, row)),
        onCommandStart: (command) => Effect.sync(() => pipeline.onCommandStart(command)),
        onCommandEnd: () => Effect.sync(() => pipeline.onCommandEnd()),
        onAltScreenChange: (entering) =>
          Effect.sync(() => pipeline.onAltScreenChange(entering)),
        onProcessChange: () => Effect.sync(() => pipeline.onProcessChange()),
        flush: () => Effect.sync(() => pipeline.flush()),
        submitCommandOutput: (lines, command) =>
          Effect.sync(() => pipeline.submitCommandOutput(lines, command)),
        triggerPrettify: (formatId, content) =>
          Effect.sync(() => pipeline.triggerPrettify(formatId, content)),
        toggleGlobal,
        isEnabled: () => Effect.sync(() => pipeline.isEnabled()),
        toggleBlock: (blockId) => Effect.sync(() => pipeline.toggleBlock(blockId)),
        blockAtRow: (row) => Effect.sync(() => Option.fromNullable(pipeline.blockAtRow(row))),
        activeBlocks: () => Effect.sync(() => pipeline.activeBlocks()),
        suppressDetection: (range) => Effect.sync(() => pipeline.suppressDetection(range)),
        isSuppressed: (range) => Effect.sync(() => pipeline.isSuppressed(range)),
        updateRendererConfig: (config) =>
          Effect.sync(() => pipeline.updateRendererConfig(config)),
        updateCellDims: (widthPx, heightPx) =>
          Effect.sync(() => pipeline.updateCellDims(widthPx, heightPx)),
        reRenderIfNeeded: () => Effect.sync(() => pipeline.reRenderIfNeeded()),
        resetBoundary: () => Effect.sync(() => pipeline.resetBoundary()),
        clearBlocks: () => Effect.sync(() => pipeline.clearBlocks()),
        detectionScope: () => Effect.sync(() => pipeline.detectionScope()),
        cacheStats: () => Effect.sync(() => pipeline.renderCache().stats()),
        detectClaudeCodeSession: (env, processName) =>
          Effect.sync(() => pipeline.detectClaudeCodeSession(env, processName)),
        markClaudeCodeActive: () => Effect.sync(() => pipeline.markClaudeCodeActive()),
        processClaudeCodeLine: (line, row) =>
          Effect.sync(() => Option.fromNullable(pipeline.processClaudeCodeLine(line, row))),
        onClaudeCodeExpand: (range) => Effect.sync(() => pipeline.onClaudeCodeExpand(range)),
        onClaudeCodeCollapse: (range) =>
          Effect.sync(() => Option.fromNullable(pipeline.onClaudeCodeCollapse(range))),
        tick,
      })
    })
  )
}
