/**
 * UI Initialization
 *
 * Loads the terminal styling packages on first use
 * @module utils/ui/init
 */

import { createLogger } from '../logger';
import { moduleCache, initialized, setInitialized } from './types';

const log = createLogger('ui');

/**
 * Initialize UI dependencies (call once at startup)
 */
export async function initUI(): Promise<void> {
  if (initialized) return;

  try {
    const [chalkImport, boxenImport, gradientImport, oraImport] = await Promise.all([
      import('chalk'),
      import('boxen'),
      import('gradient-string'),
      import('ora'),
    ]);

    moduleCache.chalk = chalkImport.default;
    moduleCache.boxen = boxenImport.default;
    moduleCache.gradient = gradientImport.default;
    moduleCache.ora = oraImport.default;
    setInitialized(true);
  } catch (error) {
    // UI keeps working in plain text mode
    log.warn('UI initialization failed, using plain text mode', {
      error: error instanceof Error ? error.message : String(error),
    });
    setInitialized(true);
  }
}

/**
 * Check if colors should be used
 * Respects NO_COLOR and FORCE_COLOR environment variables
 */
export function useColors(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR) return false;
  return !!process.stdout.isTTY;
}

/**
 * Check if interactive mode (TTY + not CI)
 */
export function isInteractive(): boolean {
  return !!process.stdout.isTTY && !process.env.CI && !process.env.NO_COLOR;
}
