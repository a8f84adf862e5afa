/**
 * Tables
 * @module utils/ui/tables
 */

import Table from 'cli-table3';
import { bold } from './colors';
import { useColors } from './init';

export interface TableOptions {
  head?: string[];
  colWidths?: number[];
}

export function table(rows: string[][], options: TableOptions = {}): string {
  const instance = new Table({
    head: (options.head ?? []).map((cell) => bold(cell)),
    colWidths: options.colWidths ?? [],
    style: useColors() ? { head: [], border: ['gray'] } : { head: [], border: [] },
  });
  instance.push(...rows);
  return instance.toString();
}
