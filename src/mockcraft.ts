#!/usr/bin/env node
import { resolveCommand } from './commands/router';
import { handleHelpCommand } from './commands/help-command';
import { exitWithSuccess, handleError, UserAbortError, withErrorHandling } from './errors';
import { getVersion } from './utils/version';

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);

  if (command === undefined || command === '--help' || command === '-h') {
    await handleHelpCommand();
  } else if (command === '--version' || command === '-v') {
    console.log(`mockcraft v${getVersion()}`);
  } else {
    await resolveCommand(command)(rest);
  }

  exitWithSuccess();
}

process.on('SIGINT', () => handleError(new UserAbortError()));

void withErrorHandling(main)();
