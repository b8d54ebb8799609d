import { Command } from 'commander';

import { registerSortCommand } from './sort.js';
import { registerDuplicatesCommand } from './duplicates.js';
import { registerInitCommand } from './init.js';

export function registerAllCommands(program: Command): void {
  registerSortCommand(program);
  registerDuplicatesCommand(program);
  registerInitCommand(program);
}
