#!/usr/bin/env node

import { Command } from 'commander';

import { VERSION } from './config.js';
import { registerAllCommands } from './commands/index.js';

const program = new Command();

program
  .name('mediasort')
  .description('Organize media files by date and optionally compress the result')
  .version(VERSION);

registerAllCommands(program);

await program.parseAsync();
