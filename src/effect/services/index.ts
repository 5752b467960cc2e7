/**
 * Services barrel export.
 */
export { FormatRegistry, Prettifier } from "./Prettifier"
