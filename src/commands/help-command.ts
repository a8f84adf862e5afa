import { getConfigPath } from '../config';
import { box, color, dim, gradientText, initUI, subheader } from '../utils/ui';
import { getVersion } from '../utils/version';

/**
 * Print a titled block of aligned `command  description` rows
 */
function printSection(title: string, items: [string, string][]): void {
  console.log(subheader(`${title}:`));

  const maxCmdLen = Math.max(...items.map(([cmd]) => cmd.length));
  for (const [cmd, desc] of items) {
    console.log(`  ${color(cmd.padEnd(maxCmdLen + 2), 'command')} ${desc}`);
  }
  console.log('');
}

export async function handleHelpCommand(): Promise<void> {
  await initUI();

  const banner = `${gradientText('mockcraft')}  v${getVersion()}

MockServer expectations from declarative blueprints`;

  console.log(box(banner, { padding: 1 }));
  console.log('');

  console.log(subheader('Usage:'));
  console.log(`  ${color('mockcraft', 'command')} <command> [options]`);
  console.log('');

  printSection('Commands', [
    ['build <blueprint>', 'Build, validate and export expectations as MockServer JSON'],
    ['validate <file>', 'Check a blueprint or an exported JSON file'],
    ['inspect <file>', 'Show counts and a summary of every expectation'],
    ['features', 'List features usable in blueprint entries'],
    ['config [show|get|set|path]', 'Show or change settings'],
  ]);

  printSection('Build options', [
    ['-o, --output <file>', 'Write to a file instead of stdout'],
    ['--no-progressive', 'Keep progressive policies unexpanded'],
    ['--indent <n>', 'JSON indentation (0 writes one line)'],
    ['--no-ids', 'Omit expectation ids'],
  ]);

  printSection('Flags', [
    ['-h, --help', 'Show this help message'],
    ['-v, --version', 'Show version'],
  ]);

  console.log(subheader('Environment:'));
  console.log(`  MOCKCRAFT_HOME        ${dim('config directory')} ${color(getConfigPath(), 'path')}`);
  console.log(`  MOCKCRAFT_LOG_LEVEL   ${dim('debug | info | warn | error')}`);
  console.log(`  MOCKCRAFT_DEBUG=1     ${dim('debug logging and error details')}`);
  console.log('');
}
