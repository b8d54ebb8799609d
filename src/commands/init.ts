import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'fs';

import { DEFAULT_CONFIG, getAppPaths, saveConfig, expandPath } from '../config.js';
import { InitCommandOptionsSchema } from './options.js';
import { parseOptions } from './shared.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write the default configuration file')
    .option('--config <file>', 'Write to this path instead of the default location')
    .option('-f, --force', 'Replace an existing configuration file')
    .action((rawOptions: unknown) => {
      const options = parseOptions(InitCommandOptionsSchema, rawOptions);
      const configFile = options.config ? expandPath(options.config) : getAppPaths().configFile;

      if (existsSync(configFile) && !options.force) {
        console.error(chalk.yellow(`\n  ${configFile} already exists. Use --force to replace it.\n`));
        process.exit(1);
      }

      saveConfig(DEFAULT_CONFIG, configFile);
      console.log(chalk.green(`\n  Config written: ${configFile}\n`));
    });
}
