/**
 * UI Types and Module Cache
 *
 * @module utils/ui/types
 */

export type ChalkInstance = typeof import('chalk');
export type BoxenFunction = typeof import('boxen');
export type GradientStringInstance = typeof import('gradient-string');
export type OraModule = typeof import('ora');

/**
 * Semantic color names mapped to terminal colors
 */
export const COLORS = {
  success: 'green',
  error: 'red',
  warning: 'yellow',
  info: 'cyan',
  primary: 'blue',
  secondary: 'magenta',
  command: 'yellow',
  path: 'cyan',
  highlight: 'whiteBright',
  dim: 'gray',
} as const;

export type ColorName = keyof typeof COLORS;

/** Populated by initUI(); stays empty in plain text mode */
export const moduleCache: {
  chalk: ChalkInstance | null;
  boxen: BoxenFunction | null;
  gradient: GradientStringInstance | null;
  ora: OraModule | null;
} = {
  chalk: null,
  boxen: null,
  gradient: null,
  ora: null,
};

export let initialized = false;

export function setInitialized(value: boolean): void {
  initialized = value;
}
