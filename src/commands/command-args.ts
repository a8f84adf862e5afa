/**
 * Argument helpers shared by the subcommands
 */

import { InputValidationError } from '../errors';

export interface ParsedArgs {
  positionals: string[];
  /** Flag name (without dashes) to value; boolean flags map to `true` */
  flags: Map<string, string | true>;
}

/**
 * Split raw arguments into positionals and flags.
 *
 * @param valueFlags flags that take a value, with their short aliases,
 *   e.g. `{ output: ['o'] }`
 * @param booleanFlags flags without a value
 */
export function parseArgs(
  args: readonly string[],
  valueFlags: Record<string, string[]> = {},
  booleanFlags: readonly string[] = []
): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  const resolve = (raw: string): string | undefined => {
    const name = raw.replace(/^--?/, '');
    if (Object.keys(valueFlags).includes(name) || booleanFlags.includes(name)) return name;
    return Object.keys(valueFlags).find((flag) => valueFlags[flag].includes(name));
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const [rawName, inline] = arg.split(/=(.*)/s, 2);
    const name = resolve(rawName);
    if (!name) {
      throw new InputValidationError('option', arg);
    }

    if (booleanFlags.includes(name)) {
      flags.set(name, true);
      continue;
    }

    const value = inline ?? args[i + 1];
    if (value === undefined || (inline === undefined && value.startsWith('-'))) {
      throw new InputValidationError('option', arg, `${rawName} <value>`);
    }
    if (inline === undefined) i++;
    flags.set(name, value);
  }

  return { positionals, flags };
}

export function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function hasFlag(parsed: ParsedArgs, name: string): boolean {
  return parsed.flags.get(name) === true;
}
