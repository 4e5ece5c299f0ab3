#!/usr/bin/env node
import { Command } from 'commander';
import { VERSION } from '@tally/shared';
import { serveCommand } from '../src/commands/serve.js';
import { usersCommand } from '../src/commands/users.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('tally')
  .description('Tally - personal expense tracking API')
  .version(VERSION);

program.addCommand(serveCommand);
program.addCommand(usersCommand);
program.addCommand(configCommand);

program.parse();
