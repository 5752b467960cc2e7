/**
 * Tests for the Prettifier service.
 */
import { Effect, Layer, Option } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { PrettifierSettings } from "../../../src/effect/Config"
import {
  makePrettifierLayer,
  makePrettifierRuntime,
  PrettifierLive,
} from "../../../src/effect/runtime"
import { FormatRegistry, Prettifier } from "../../../src/effect/services"
import { RendererRegistry } from "../../../src/prettifier/registry"
import { CountingRenderer, prefixDetector, rowLines } from "../../prettifier/helpers"

const testLayer = (input: unknown = {}) => {
  const registry = new RendererRegistry(0.6)
    .registerDetector(50, prefixDetector("json", "{"))
    .registerRenderer("json", new CountingRenderer("json"))

  return Prettifier.layer.pipe(
    Layer.provideMerge(FormatRegistry.fromRegistry(registry)),
    Layer.provideMerge(PrettifierSettings.fromInput(input))
  )
}

describe("Prettifier", () => {
  describe("layer", () => {
    it.effect("detects submitted command output", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        yield* prettifier.submitCommandOutput(rowLines(['{"a":1}', "x"], 4), "curl example.test")

        const block = yield* prettifier.blockAtRow(5)
        expect(Option.isSome(block)).toBe(true)
        expect(Option.map(block, (b) => b.detection.formatId)).toEqual(Option.some("json"))

        const missing = yield* prettifier.blockAtRow(99)
        expect(Option.isNone(missing)).toBe(true)

        const stats = yield* prettifier.cacheStats()
        expect(stats.entryCount).toBe(1)
        expect(stats.missCount).toBe(1)
      }).pipe(Effect.provide(testLayer()))
    )

    it.effect("applies the configured threshold to the registry", () =>
      Effect.gen(function* () {
        const registry = yield* FormatRegistry
        expect(registry.confidenceThreshold).toBe(0.95)

        const prettifier = yield* Prettifier
        yield* prettifier.submitCommandOutput(rowLines(['{"a":1}'], 0), null)
        const blocks = yield* prettifier.activeBlocks()
        expect(blocks).toHaveLength(0)
      }).pipe(Effect.provide(testLayer({ confidenceThreshold: 0.95 })))
    )

    it.effect("toggles the global state", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        expect(yield* prettifier.toggleGlobal()).toBe(false)
        expect(yield* prettifier.isEnabled()).toBe(false)
        expect(yield* prettifier.toggleGlobal()).toBe(true)
      }).pipe(Effect.provide(testLayer()))
    )

    it.effect("emits debounced output on tick", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        yield* prettifier.processOutput('{"a":1}', 0)
        yield* prettifier.tick()

        const blocks = yield* prettifier.activeBlocks()
        expect(blocks).toHaveLength(1)
        expect(blocks[0].hasRendered).toBe(true)
      }).pipe(Effect.provide(testLayer({ debounceMs: 0 })))
    )

    it.effect("toggles a block view", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        yield* prettifier.submitCommandOutput(rowLines(['{"a":1}'], 0), null)
        const [block] = yield* prettifier.activeBlocks()

        expect(yield* prettifier.toggleBlock(block.blockId)).toBe(true)
        expect(block.viewMode).toBe("source")
      }).pipe(Effect.provide(testLayer()))
    )

    it.effect("tracks collapse markers once a session is active", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        const before = yield* prettifier.processClaudeCodeLine("(ctrl+o to expand)", 3)
        expect(Option.isNone(before)).toBe(true)

        yield* prettifier.markClaudeCodeActive()
        const after = yield* prettifier.processClaudeCodeLine("(ctrl+o to expand)", 3)
        expect(Option.map(after, (event) => event._tag)).toEqual(Option.some("ContentCollapsed"))
      }).pipe(Effect.provide(testLayer()))
    )

    it.effect("stores a preview when a marker collapses", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        yield* prettifier.markClaudeCodeActive()
        yield* prettifier.processClaudeCodeLine("(ctrl+o to expand)", 0)
        yield* prettifier.submitCommandOutput(rowLines(['{"a":1}'], 0), null)

        const event = yield* prettifier.onClaudeCodeCollapse({ start: 0, end: 1 })
        expect(Option.map(event, (e) => e._tag)).toEqual(Option.some("ContentCollapsed"))

        const missing = yield* prettifier.onClaudeCodeCollapse({ start: 5, end: 6 })
        expect(Option.isNone(missing)).toBe(true)
      }).pipe(Effect.provide(testLayer()))
    )

    it.effect("suppresses detection for a range", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        yield* prettifier.suppressDetection({ start: 0, end: 10 })
        expect(yield* prettifier.isSuppressed({ start: 1, end: 2 })).toBe(true)

        yield* prettifier.submitCommandOutput(rowLines(['{"a":1}'], 1), null)
        expect(yield* prettifier.activeBlocks()).toHaveLength(0)
      }).pipe(Effect.provide(testLayer()))
    )
  })

  describe("runtime", () => {
    it.effect("wires the built-in registry with default settings", () =>
      Effect.gen(function* () {
        const registry = yield* FormatRegistry
        expect(registry.detectorCount).toBe(2)
        expect(registry.rendererCount).toBe(2)

        const prettifier = yield* Prettifier
        expect(yield* prettifier.detectionScope()).toBe("all")
      }).pipe(Effect.provide(PrettifierLive))
    )

    it.effect("renders built-in formats with the default layer", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        yield* prettifier.submitCommandOutput(
          rowLines(["{", '  "name": "widget",', '  "count": 1', "}"], 0),
          null
        )

        const blocks = yield* prettifier.activeBlocks()
        expect(blocks).toHaveLength(1)
        expect(blocks[0].detection.formatId).toBe("json")
        expect(blocks[0].buffer.renderedText()).toBe('{\n  "name": "widget",\n  "count": 1\n}')
        expect(blocks[0].buffer.renderedContent?.formatBadge).toBe("{}")
      }).pipe(Effect.provide(PrettifierLive))
    )

    it.effect("decodes settings for the layer", () =>
      Effect.gen(function* () {
        const prettifier = yield* Prettifier
        expect(yield* prettifier.detectionScope()).toBe("manual_only")
      }).pipe(Effect.provide(makePrettifierLayer({ detectionScope: "manual_only" })))
    )

    it.effect("fails to build with invalid settings", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          Prettifier.pipe(Effect.provide(makePrettifierLayer({ debounceMs: -1 })))
        )
        expect(error._tag).toBe("ConfigDecodeError")
      })
    )

    it("runs effects through a managed runtime", async () => {
      const runtime = makePrettifierRuntime({ enabled: false })
      const enabled = await runtime.runPromise(
        Effect.flatMap(Prettifier, (prettifier) => prettifier.isEnabled())
      )
      expect(enabled).toBe(false)
      await runtime.dispose()
    })
  })
})
