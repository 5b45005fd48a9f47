#!/usr/bin/env node

import { Command } from 'commander';
import { Logger } from '@rootsign/core';
import { registerInitCommand } from './commands/init/init';
import { registerVerifyCommand } from './commands/verify/verify';
import { registerRemoteCommand } from './commands/remote/remote';
import { registerTemplatesCommand } from './commands/templates/templates';

const program = new Command();

program
  .name('rootsign')
  .description('Bootstrap Git repositories rooted in a signed inception commit')
  .version('0.1.0');

// Core modules log progress at info; only --verbose shows it
program.hook('preAction', (_program, actionCommand) => {
  Logger.setLogLevel(actionCommand.opts()['verbose'] ? 'debug' : 'warn');
});

registerInitCommand(program);
registerVerifyCommand(program);
registerRemoteCommand(program);
registerTemplatesCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
