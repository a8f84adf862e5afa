/**
 * Boxed messages
 * @module utils/ui/boxes
 */

import type { Options as BoxenOptions } from 'boxen';
import { moduleCache } from './types';

export type BoxOptions = BoxenOptions;

function plainBox(content: string, title?: string): string {
  const lines = content.split('\n');
  const width = Math.max(...lines.map((line) => line.length), title ? title.length + 2 : 0);
  const top = title ? `+- ${title} ${'-'.repeat(Math.max(0, width - title.length - 1))}+` : `+${'-'.repeat(width + 2)}+`;
  const body = lines.map((line) => `| ${line.padEnd(width)} |`);
  return [top, ...body, `+${'-'.repeat(width + 2)}+`].join('\n');
}

export function box(content: string, options: BoxOptions = {}): string {
  const boxen = moduleCache.boxen;
  if (!boxen) return plainBox(content, options.title);
  return boxen(content, { padding: 1, ...options });
}
