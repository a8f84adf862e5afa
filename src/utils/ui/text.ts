/**
 * Text formatting
 * @module utils/ui/text
 */

import { bold, color, dim } from './colors';

export function header(text: string): string {
  return bold(color(`=== ${text} ===`, 'primary'));
}

export function subheader(text: string): string {
  return bold(text);
}

export function hr(width = 60): string {
  return dim('-'.repeat(width));
}

export function sectionHeader(text: string): string {
  return `\n${color(text, 'highlight')}\n${hr(Math.max(text.length, 20))}`;
}
