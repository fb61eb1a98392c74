/**
 * Default configuration values
 */

import { DEFAULT_EMPTY_MARKER } from '@sentinel-chess/board';

import type { DisplayConfigSchema, OutputConfigSchema, SentinelConfig } from './schema.js';

/**
 * Default display configuration
 * Square shades match a grey terminal board: light rgb(180,180,180), dark rgb(120,120,120)
 */
export const DEFAULT_DISPLAY_CONFIG: DisplayConfigSchema = {
  glyphs: 'unicode',
  perspective: 'white',
  coordinates: true,
  color: true,
  emptyMarker: DEFAULT_EMPTY_MARKER,
  lightSquare: '#b4b4b4',
  darkSquare: '#787878',
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  status: false,
  verbose: false,
};

export const DEFAULT_CONFIG: SentinelConfig = {
  display: DEFAULT_DISPLAY_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
