/**
 * Conditional colorization
 */

import chalk from 'chalk';

import type { ColorFunctions } from './types.js';

const identity = (text: string): string => text;

/**
 * Color functions that leave text unchanged
 */
export const PLAIN_COLORS: ColorFunctions = {
  bold: identity,
  dim: identity,
  green: identity,
  red: identity,
  yellow: identity,
};

/**
 * Create color functions, or plain ones when color is disabled
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (!useColor) {
    return PLAIN_COLORS;
  }
  return {
    bold: (text: string) => chalk.bold(text),
    dim: (text: string) => chalk.dim(text),
    green: (text: string) => chalk.green(text),
    red: (text: string) => chalk.red(text),
    yellow: (text: string) => chalk.yellow(text),
  };
}
