/**
 * Color helpers
 * @module utils/ui/colors
 */

import { useColors } from './init';
import { COLORS, ColorName, moduleCache } from './types';

export function color(text: string, name: ColorName): string {
  const chalk = moduleCache.chalk;
  if (!chalk || !useColors()) return text;
  return chalk[COLORS[name]](text);
}

export function bold(text: string): string {
  const chalk = moduleCache.chalk;
  if (!chalk || !useColors()) return text;
  return chalk.bold(text);
}

export function dim(text: string): string {
  const chalk = moduleCache.chalk;
  if (!chalk || !useColors()) return text;
  return chalk.gray(text);
}

/**
 * Gradient for banners; plain text without color support
 */
export function gradientText(text: string): string {
  const gradient = moduleCache.gradient;
  if (!gradient || !useColors()) return text;
  return gradient(['#0099F7', '#F11712'])(text);
}
