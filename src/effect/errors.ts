/**
 * Tagged errors for the prettifier.
 * None of these escape the pipeline: render errors are logged and absorbed
 * per block, config errors surface only from decoding.
 */
import { Schema } from "effect"

/** A renderer could not produce output for matched content */
export class RenderFailedError extends Schema.TaggedError<RenderFailedError>()(
  "RenderFailedError",
  {
    formatId: Schema.String,
    reason: Schema.String,
  }
) {}

/** No renderer is registered for a detected format */
export class RendererNotFoundError extends Schema.TaggedError<RendererNotFoundError>()(
  "RendererNotFoundError",
  {
    formatId: Schema.String,
  }
) {}

/** Configuration input did not match the schema */
export class ConfigDecodeError extends Schema.TaggedError<ConfigDecodeError>()(
  "ConfigDecodeError",
  {
    message: Schema.String,
  }
) {}

export type RenderError = RenderFailedError | RendererNotFoundError
