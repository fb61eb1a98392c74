/**
 * Configuration module exports
 */

// Schema types
export type {
  GlyphStyle,
  Perspective,
  DisplayConfigSchema,
  OutputConfigSchema,
  SentinelConfig,
  CliOptions,
} from './schema.js';

// Defaults
export { DEFAULT_DISPLAY_CONFIG, DEFAULT_OUTPUT_CONFIG, DEFAULT_CONFIG } from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  glyphStyleSchema,
  perspectiveSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialSentinelConfig,
} from './validation.js';

// Loader
export { loadConfig, loadConfigFile, loadEnvConfig, formatConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
