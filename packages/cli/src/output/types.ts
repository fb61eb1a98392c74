/**
 * Shared types for terminal output
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  yellow: ColorFn;
}

/**
 * Line sink, e.g. stdout or stderr
 */
export type LineWriter = (line: string) => void;
