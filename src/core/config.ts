/**
 * Default limits and theme for the prettifier
 */

import type { RendererConfig, ThemeColors } from '../prettifier/types';

/** Render cache capacity */
export const DEFAULT_CACHE_SIZE = 64;

/** Active blocks kept before oldest-first eviction */
export const MAX_ACTIVE_BLOCKS = 128;

/** Lines handed to detectors for quick matching */
export const QUICK_MATCH_LINES = 30;

/** Consecutive blank lines that end a block in `all` scope */
export const DEFAULT_BLANK_LINE_THRESHOLD = 2;

export const DEFAULT_TERMINAL_WIDTH = 80;

/**
 * Catppuccin Mocha inspired palette.
 * Index 8 is used for dim text, 2 for strings, 6 for keys, 1 for errors,
 * 11 for numbers and 14 as the accent.
 */
export const DEFAULT_THEME_COLORS: ThemeColors = {
  fg: [205, 214, 244],
  bg: [30, 30, 46],
  palette: [
    [69, 71, 90],
    [243, 139, 168],
    [166, 227, 161],
    [249, 226, 175],
    [137, 180, 250],
    [203, 166, 247],
    [148, 226, 213],
    [186, 194, 222],
    [108, 112, 134],
    [235, 160, 172],
    [166, 227, 161],
    [249, 226, 175],
    [116, 199, 236],
    [245, 194, 231],
    [137, 220, 235],
    [205, 214, 244],
  ],
};

export const createDefaultRendererConfig = (
  overrides: Partial<RendererConfig> = {}
): RendererConfig => ({
  terminalWidth: DEFAULT_TERMINAL_WIDTH,
  cellWidthPx: null,
  cellHeightPx: null,
  themeColors: DEFAULT_THEME_COLORS,
  ...overrides,
});
