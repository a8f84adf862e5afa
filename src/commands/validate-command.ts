/**
 * Validate Command
 *
 * mockcraft validate <blueprint|export.json>
 */

import { loadExpectationSource } from '../blueprint';
import { loadOrCreateConfig } from '../config';
import { assertOrExit, ConstructionError, ExitCode } from '../errors';
import { formatIssue, validateExpectations } from '../expectation';
import { fail, initUI, ok, warn } from '../utils/ui';
import { parseArgs } from './command-args';

export async function handleValidateCommand(args: string[]): Promise<void> {
  await initUI();

  const target = parseArgs(args).positionals[0];
  if (!target) {
    throw new ConstructionError('Usage: mockcraft validate <blueprint|export.json>', 'validate');
  }

  const config = loadOrCreateConfig();
  const source = loadExpectationSource(target, { defaults: config.defaults });
  const report = validateExpectations(source.expectations);

  for (const issue of report.errors) {
    console.log(fail(formatIssue(issue)));
  }
  for (const issue of report.warnings) {
    console.log(warn(formatIssue(issue)));
  }

  assertOrExit(report.valid, `${report.errors.length} error(s) in ${target}`, ExitCode.VALIDATION_ERROR);

  const kind = source.kind === 'blueprint' ? 'blueprint' : 'MockServer export';
  console.log(ok(`${target}: ${source.expectations.length} valid expectation(s) (${kind})`));
}
