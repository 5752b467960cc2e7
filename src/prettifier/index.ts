/**
 * Prettifier barrel export.
 */
export * from './types'
export * from './rules'
export * from './registry'
export * from './regex-detector'
export * from './render-cache'
export * from './buffer'
export * from './claude-code'
export * from './boundary/detector'
export * from './boundary/fence'
export * from './detectors'
export * from './renderers'
export * from './pipeline'
