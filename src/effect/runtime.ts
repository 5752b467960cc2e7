/**
 * Layer composition and runtime for the prettifier services.
 */
import { Layer, ManagedRuntime } from "effect"
import { PrettifierSettings } from "./Config"
import type { ConfigDecodeError } from "./errors"
import { FormatRegistry, Prettifier } from "./services"

/** Default settings with the built-in registry */
export const PrettifierLive = Prettifier.layer.pipe(
  Layer.provideMerge(FormatRegistry.builtin),
  Layer.provideMerge(PrettifierSettings.layer)
)

/** Settings decoded from untrusted input, with the built-in registry */
export const makePrettifierLayer = (
  input: unknown
): Layer.Layer<Prettifier | FormatRegistry | PrettifierSettings, ConfigDecodeError> =>
  Prettifier.layer.pipe(
    Layer.provideMerge(FormatRegistry.builtin),
    Layer.provideMerge(PrettifierSettings.fromInput(input))
  )

export const makePrettifierRuntime = (input: unknown = {}) =>
  ManagedRuntime.make(makePrettifierLayer(input))
