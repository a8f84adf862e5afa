/**
 * Command Router
 *
 * Dispatches `mockcraft <command> ...` to its handler.
 */

import { ConstructionError } from '../errors';
import { handleBuildCommand } from './build-command';
import { handleConfigCommand } from './config-command';
import { handleFeaturesCommand } from './features-command';
import { handleHelpCommand } from './help-command';
import { handleInspectCommand } from './inspect-command';
import { handleValidateCommand } from './validate-command';

export type CommandHandler = (args: string[]) => Promise<void>;

export const COMMANDS: Record<string, CommandHandler> = {
  build: handleBuildCommand,
  validate: handleValidateCommand,
  inspect: handleInspectCommand,
  features: () => handleFeaturesCommand(),
  config: handleConfigCommand,
  help: () => handleHelpCommand(),
};

export function resolveCommand(name: string): CommandHandler {
  if (!Object.hasOwn(COMMANDS, name)) {
    throw new ConstructionError(`Unknown command '${name}'. Run 'mockcraft --help' for usage.`, 'command');
  }
  return COMMANDS[name];
}
