/**
 * Zod validation schemas for configuration
 */

import { GLYPH_STYLES } from '@sentinel-chess/board';
import { z } from 'zod';

/**
 * Hex color schema (#rrggbb)
 */
const hexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #rrggbb color');

/**
 * Glyph style schema
 */
export const glyphStyleSchema = z.enum(GLYPH_STYLES);

/**
 * Board perspective schema
 */
export const perspectiveSchema = z.enum(['white', 'black']);

/**
 * Display configuration schema
 */
export const displayConfigSchema = z.object({
  glyphs: glyphStyleSchema,
  perspective: perspectiveSchema,
  coordinates: z.boolean(),
  color: z.boolean(),
  emptyMarker: z.string().length(1),
  lightSquare: hexColorSchema,
  darkSquare: hexColorSchema,
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  status: z.boolean(),
  verbose: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  display: displayConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z.object({
  display: displayConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

export type PartialSentinelConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
}

/**
 * Validate a partial configuration (from a config file or the environment)
 * @returns The validated configuration
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialSentinelConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
