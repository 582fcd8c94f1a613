#!/usr/bin/env node
import { Command } from 'commander';
import { parseCommand } from './commands/parse.js';
import { createCommand } from './commands/create.js';
import { validateConfigCommand } from './commands/validate-config.js';

const program = new Command();

program
  .name('backlog-importer')
  .description('Turn backlog documents into Jira epics, stories and tasks')
  .version('0.1.0');

program.addCommand(parseCommand);
program.addCommand(createCommand);
program.addCommand(validateConfigCommand);

await program.parseAsync();
