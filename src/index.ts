#!/usr/bin/env node

import { Command } from 'commander';
import {
  initCommand,
  configCommand,
  authCommand,
  issueCommand,
  fieldCommand,
} from './cli/commands/index.js';
import { setLogLevel } from './utils/logger.js';

const program = new Command();

program
  .name('tracker')
  .description('Command-line client for the issue tracker REST API')
  .version('0.1.0')
  .option('--debug', 'Log HTTP requests and responses');

program.hook('preAction', thisCommand => {
  if (thisCommand.opts<{ debug?: boolean }>().debug) {
    setLogLevel('debug');
  }
});

// Workspace setup
program.addCommand(initCommand);
program.addCommand(configCommand);
program.addCommand(authCommand);

// Issues and fields
program.addCommand(issueCommand);
program.addCommand(fieldCommand);

// Parse and run
await program.parseAsync();
