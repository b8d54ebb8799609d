import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'path';

import { expandPath } from '../config.js';
import { assertDirectory, createExtensionFilter, discoverMedia } from '../core/scanner.js';
import { groupByDigest, duplicatesOnly } from '../core/deduplicator.js';
import { renderDuplicateGroups } from '../ui/table.js';
import { renderProgressBar } from '../ui/progress.js';
import { DuplicatesCommandOptionsSchema } from './options.js';
import { parseOptions, prepareRun, reportFailure } from './shared.js';

export function registerDuplicatesCommand(program: Command): void {
  program
    .command('duplicates')
    .description('List groups of byte-identical media files')
    .requiredOption('-i, --input <dirs...>', 'One or more input directories containing media files')
    .option('--config <file>', 'Use this configuration file')
    .option('--debug', 'Verbose logging')
    .action(async (rawOptions: unknown) => {
      const options = parseOptions(DuplicatesCommandOptionsSchema, rawOptions);
      const spinner = ora();

      try {
        const { settings, mediaExtensions } = prepareRun(options);
        const inputs = options.input.map(input => resolve(expandPath(input)));

        for (const input of inputs) {
          await assertDirectory(input);
        }

        spinner.start('Listing media files...');
        const media = await discoverMedia(inputs, {
          predicate: createExtensionFilter(mediaExtensions),
          includeHidden: settings.includeHidden,
        });
        spinner.text = 'Hashing files...';

        const groups = duplicatesOnly(await groupByDigest(media, {
          algorithm: settings.hashAlgorithm,
          concurrency: settings.concurrency,
          onProgress: (hashed, total) => {
            spinner.text = renderProgressBar(hashed, total, { label: 'Hashing files' });
          },
        }));
        spinner.succeed(`Hashed ${media.length} files`);

        if (groups.length === 0) {
          console.log(chalk.green('\n  No duplicates found!\n'));
          return;
        }

        console.log('\n' + renderDuplicateGroups(groups) + '\n');
      } catch (error) {
        spinner.stop();
        reportFailure(error);
      }
    });
}
