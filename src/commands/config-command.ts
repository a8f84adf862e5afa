/**
 * Config Command
 *
 * mockcraft config [show]
 * mockcraft config get <key>
 * mockcraft config set <key> <value>
 * mockcraft config path
 */

import {
  getConfigPath,
  getConfigValue,
  hasConfig,
  listConfigKeys,
  loadOrCreateConfig,
  setConfigValue,
  updateConfig,
} from '../config';
import { ConstructionError } from '../errors';
import { color, dim, header, initUI, ok, table } from '../utils/ui';

function showConfig(): void {
  const config = loadOrCreateConfig();
  console.log(header('mockcraft config'));
  console.log(dim(hasConfig() ? getConfigPath() : `${getConfigPath()} (not created yet, showing defaults)`));
  console.log('');

  const rows = listConfigKeys().map(({ key, description }) => [key, String(getConfigValue(config, key)), description]);
  console.log(table(rows, { head: ['Key', 'Value', 'Description'] }));
}

export async function handleConfigCommand(args: string[]): Promise<void> {
  await initUI();

  const [subcommand, key, value] = args;

  switch (subcommand) {
    case undefined:
    case 'show':
      showConfig();
      return;

    case 'path':
      console.log(getConfigPath());
      return;

    case 'get':
      if (!key) {
        throw new ConstructionError('Usage: mockcraft config get <key>', 'config');
      }
      console.log(String(getConfigValue(loadOrCreateConfig(), key)));
      return;

    case 'set': {
      if (!key || value === undefined) {
        throw new ConstructionError('Usage: mockcraft config set <key> <value>', 'config');
      }
      const config = updateConfig((current) => setConfigValue(current, key, value));
      console.log(ok(`${key} = ${color(String(getConfigValue(config, key)), 'highlight')}`));
      return;
    }

    default:
      throw new ConstructionError(`Unknown config subcommand '${subcommand}'. Use show, get, set or path.`, 'config');
  }
}
