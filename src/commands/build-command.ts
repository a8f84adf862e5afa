/**
 * Build Command
 *
 * mockcraft build <blueprint> [-o file] [--no-progressive] [--indent n] [--no-ids]
 *
 * Builds, validates and expands a blueprint, then writes MockServer JSON
 * to stdout or to a file. Status lines go to stderr so stdout can be piped.
 */

import * as fs from 'fs';
import * as path from 'path';
import { buildBatch, loadBlueprintFile } from '../blueprint';
import { isValidIndent, loadOrCreateConfig, MAX_EXPORT_INDENT } from '../config';
import { ConstructionError, InputValidationError, registerCleanup } from '../errors';
import { formatIssue } from '../expectation';
import { toMockServerJson } from '../serializer';
import { createLogger } from '../utils/logger';
import { initUI, spinner, warn } from '../utils/ui';
import { hasFlag, parseArgs, stringFlag } from './command-args';

const log = createLogger('build');

/**
 * Write through a temp file so an interrupted run never leaves a
 * truncated export behind.
 */
export function writeExportFile(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const tempPath = `${filePath}.tmp.${process.pid}`;
  const unregister = registerCleanup(() => {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
  });
  try {
    fs.writeFileSync(tempPath, content.endsWith('\n') ? content : `${content}\n`);
    fs.renameSync(tempPath, filePath);
  } finally {
    unregister();
  }
}

function parseIndent(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === '' || !isValidIndent(value)) {
    throw new InputValidationError('indent', raw, `integer 0-${MAX_EXPORT_INDENT}`);
  }
  return value;
}

export async function handleBuildCommand(args: string[]): Promise<void> {
  await initUI();

  const parsed = parseArgs(args, { output: ['o'], indent: [] }, ['no-progressive', 'no-ids']);
  const blueprintPath = parsed.positionals[0];
  if (!blueprintPath) {
    throw new ConstructionError('Usage: mockcraft build <blueprint> [-o file] [--no-progressive]', 'build');
  }

  const config = loadOrCreateConfig();
  const output = stringFlag(parsed, 'output');
  const indent = parseIndent(stringFlag(parsed, 'indent'), config.export.indent);
  const progressive = config.progressive.enabled && !hasFlag(parsed, 'no-progressive');

  const spin = spinner(`Building ${blueprintPath}`).start();
  const unregister = registerCleanup(() => spin.stop());

  try {
    const blueprint = loadBlueprintFile(blueprintPath);
    const result = buildBatch(blueprint, { defaults: config.defaults, progressive });
    const json = toMockServerJson(result.expectations, {
      indent,
      includeIds: config.export.include_ids && !hasFlag(parsed, 'no-ids'),
    });

    if (output) {
      writeExportFile(output, json);
    }

    const expandedNote = result.expanded > 0 ? ` (${result.expanded} from progressive delays)` : '';
    spin.succeed(
      `${result.expectations.length} expectation(s)${expandedNote} ${output ? `written to ${output}` : 'built'}`
    );
    for (const issue of result.report.warnings) {
      console.error(warn(formatIssue(issue)));
    }
    log.debug('Build finished', { blueprint: blueprintPath, output: output ?? '<stdout>' });

    if (!output) {
      console.log(json);
    }
  } catch (error) {
    spin.fail(`Build failed: ${blueprintPath}`);
    throw error;
  } finally {
    unregister();
  }
}
