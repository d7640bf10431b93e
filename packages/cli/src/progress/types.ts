/**
 * Shared types for progress and output components
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
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Use colored output (default: true) */
  color?: boolean;
}
