/**
 * Inspect Command
 *
 * mockcraft inspect <blueprint|export.json>
 *
 * Prints counts by method and status code followed by one row per
 * expectation.
 */

import { loadExpectationSource } from '../blueprint';
import { loadOrCreateConfig } from '../config';
import { ConstructionError } from '../errors';
import { describeExpectation } from '../expectation';
import type { Delay, Expectation, Times } from '../expectation';
import { computeExpectationStats } from '../serializer';
import { dim, header, initUI, subheader, table } from '../utils/ui';
import { parseArgs } from './command-args';

function formatTimes(times: Times | undefined): string {
  if (!times || times.unlimited) return 'unlimited';
  return `${times.remainingTimes}x`;
}

function formatDelay(delay: Delay | undefined): string {
  if (!delay) return '-';
  return delay.timeUnit === 'MILLISECONDS' ? `${delay.value}ms` : `${delay.value} ${delay.timeUnit.toLowerCase()}`;
}

export function expectationRows(expectations: readonly Expectation[]): string[][] {
  return expectations.map((expectation, index) => [
    String(index),
    expectation.id ?? '-',
    describeExpectation(expectation),
    String(expectation.priority),
    formatTimes(expectation.times),
    formatDelay(expectation.httpResponse.delay),
  ]);
}

export async function handleInspectCommand(args: string[]): Promise<void> {
  await initUI();

  const target = parseArgs(args).positionals[0];
  if (!target) {
    throw new ConstructionError('Usage: mockcraft inspect <blueprint|export.json>', 'inspect');
  }

  const config = loadOrCreateConfig();
  const source = loadExpectationSource(target, { defaults: config.defaults });
  const stats = computeExpectationStats(source.expectations);

  console.log(header(`${target} (${source.kind})`));
  console.log('');
  console.log(`${subheader('Total:')} ${stats.total}`);
  console.log('');

  const summaryRows = [
    ...Object.entries(stats.byMethod).map(([method, count]) => ['method', method, String(count)]),
    ...Object.entries(stats.byStatusCode).map(([status, count]) => ['status', status, String(count)]),
  ];
  if (summaryRows.length > 0) {
    console.log(table(summaryRows, { head: ['Group', 'Value', 'Count'] }));
    console.log('');
  }

  if (source.expectations.length === 0) {
    console.log(dim('  No expectations'));
    return;
  }
  console.log(
    table(expectationRows(source.expectations), { head: ['#', 'Id', 'Expectation', 'Priority', 'Times', 'Delay'] })
  );
}
