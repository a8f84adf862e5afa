/**
 * Cleanup registry for the mockcraft CLI
 *
 * Holds callbacks that must run before the process exits, whether the
 * command finished or failed: stopping a running spinner, removing the
 * temporary file of an interrupted export write.
 */

/**
 * Cleanup callback type
 * Callbacks should be synchronous and non-throwing
 */
export type CleanupCallback = () => void;

/** Executed in LIFO order (last registered = first executed) */
const cleanupCallbacks: CleanupCallback[] = [];

let cleanupRan = false;

const isDebug = (): boolean =>
  process.env['MOCKCRAFT_DEBUG'] === '1' || process.env['MOCKCRAFT_DEBUG'] === 'true';

/**
 * Register a cleanup callback
 *
 * @returns Unregister function, for resources released on the happy path
 */
export function registerCleanup(fn: CleanupCallback): () => void {
  cleanupCallbacks.push(fn);

  return () => {
    const index = cleanupCallbacks.indexOf(fn);
    if (index !== -1) {
      cleanupCallbacks.splice(index, 1);
    }
  };
}

/**
 * Run all registered cleanup callbacks once per process.
 * A failing callback does not stop the remaining ones.
 */
export function runCleanup(): void {
  if (cleanupRan) {
    return;
  }
  cleanupRan = true;

  while (cleanupCallbacks.length > 0) {
    const callback = cleanupCallbacks.pop();
    if (!callback) continue;
    try {
      callback();
    } catch (error) {
      if (isDebug()) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[!] Cleanup error: ${message}`);
      }
    }
  }
}

/**
 * Reset the registry (tests)
 */
export function clearCleanup(): void {
  cleanupCallbacks.length = 0;
  cleanupRan = false;
}

/**
 * Number of pending callbacks (tests)
 */
export function getCleanupCount(): number {
  return cleanupCallbacks.length;
}

export function hasCleanupRun(): boolean {
  return cleanupRan;
}
