/**
 * Terminal content prettifier: detects structured content in terminal output
 * and keeps styled renderings of it alongside the raw lines.
 */
export * from './core/row-range'
export {
  createDefaultRendererConfig,
  DEFAULT_THEME_COLORS,
} from './core/config'
export * from './prettifier'
export * from './effect'
