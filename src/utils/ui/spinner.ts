/**
 * Spinner
 *
 * ora spinner in interactive terminals; otherwise a stand-in that prints
 * one line per final state.
 * @module utils/ui/spinner
 */

import { isInteractive } from './init';
import { fail, info, ok, warn } from './indicators';
import { moduleCache } from './types';

export interface Spinner {
  start(): Spinner;
  succeed(message?: string): void;
  fail(message?: string): void;
  warn(message?: string): void;
  info(message?: string): void;
  stop(): void;
  text: string;
}

class PlainSpinner implements Spinner {
  constructor(public text: string) {}

  start(): Spinner {
    return this;
  }

  succeed(message?: string): void {
    console.error(ok(message ?? this.text));
  }

  fail(message?: string): void {
    console.error(fail(message ?? this.text));
  }

  warn(message?: string): void {
    console.error(warn(message ?? this.text));
  }

  info(message?: string): void {
    console.error(info(message ?? this.text));
  }

  stop(): void {
    /* nothing drawn */
  }
}

export function spinner(text: string): Spinner {
  const ora = moduleCache.ora;
  if (!ora || !isInteractive()) {
    return new PlainSpinner(text);
  }

  const instance = ora({ text, stream: process.stderr });
  const wrapped: Spinner = {
    get text() {
      return instance.text;
    },
    set text(value: string) {
      instance.text = value;
    },
    start: () => {
      instance.start();
      return wrapped;
    },
    succeed: (message) => {
      instance.succeed(message);
    },
    fail: (message) => {
      instance.fail(message);
    },
    warn: (message) => {
      instance.warn(message);
    },
    info: (message) => {
      instance.info(message);
    },
    stop: () => {
      instance.stop();
    },
  };
  return wrapped;
}
