/**
 * Package version, read from package.json next to src/ or dist/
 */

import * as fs from 'fs';
import * as path from 'path';

let cached: string | undefined;

export function getVersion(): string {
  if (cached !== undefined) return cached;

  try {
    const content = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8');
    const parsed: unknown = JSON.parse(content);
    cached =
      typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
        ? parsed.version
        : '0.0.0';
  } catch {
    cached = '0.0.0';
  }
  return cached;
}
