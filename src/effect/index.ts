/**
 * Effect module barrel export.
 */

// Types
export * from "./types"

// Errors
export * from "./errors"

// Configuration
export * from "./Config"

// Services
export * from "./services"

// Runtime
export * from "./runtime"
