import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { resolve } from 'path';
import { existsSync } from 'fs';

import { expandPath } from '../config.js';
import { sortMedia, type SortStage } from '../core/sorter.js';
import { DEPTHS } from '../core/planner.js';
import { ARCHIVE_FORMATS, archiveExtension } from '../actions/archive.js';
import { CONFLICT_POLICIES } from '../actions/copy.js';
import { isDirectory, isEmptyDirectory } from '../utils/fs-safe.js';
import { renderPlacementTable, renderSummary } from '../ui/table.js';
import { renderProgressBar } from '../ui/progress.js';
import { SortCommandOptionsSchema } from './options.js';
import { parseOptions, prepareRun, reportFailure } from './shared.js';

const STAGE_TEXT: Record<SortStage, string> = {
  discover: 'Listing media files...',
  deduplicate: 'Hashing files...',
  plan: 'Planning destinations...',
  copy: 'Copying files...',
  compress: 'Compressing...',
};

async function confirmNonEmptyOutput(output: string): Promise<boolean> {
  if (!existsSync(output) || !await isDirectory(output) || await isEmptyDirectory(output)) {
    return true;
  }

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([{
    type: 'confirm',
    name: 'proceed',
    message: `${output} already contains files. Copy into it anyway?`,
    default: false,
  }]);
  return proceed;
}

export function registerSortCommand(program: Command): void {
  program
    .command('sort', { isDefault: true })
    .description('Deduplicate media files and copy them into date folders')
    .requiredOption('-i, --input <dirs...>', 'One or more input directories containing media files')
    .requiredOption('-o, --output <dir>', 'Directory where the organized media is saved')
    .addOption(
      new Option('-d, --depth <level>', "Date folders: 'none' -> DIR/, 'year' -> DIR/YYYY/, 'month' -> DIR/YYYY/MM - Mon/, 'day' -> DIR/YYYY/MM - Mon/DD - Day/")
        .choices(DEPTHS)
    )
    .addOption(
      new Option('--compress [format]', 'Pack the result into a single archive instead of a directory')
        .choices(ARCHIVE_FORMATS)
        .preset('zip')
    )
    .addOption(
      new Option('--on-conflict <policy>', 'When a destination already exists with different content')
        .choices(CONFLICT_POLICIES)
    )
    .option('--concurrency <n>', 'Files hashed in parallel')
    .option('--dry-run', 'Show the planned layout without copying anything')
    .option('-y, --yes', 'Do not ask before copying into a non-empty directory')
    .option('--config <file>', 'Use this configuration file')
    .option('--debug', 'Verbose logging')
    .action(async (rawOptions: unknown) => {
      const options = parseOptions(SortCommandOptionsSchema, rawOptions);
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      const spinner = ora();

      try {
        const { settings, mediaExtensions } = prepareRun(options);
        const output = resolve(expandPath(options.output));
        const depth = options.depth ?? settings.depth;

        console.log(chalk.bold(`\n  Sorting into ${chalk.cyan(output)} (depth: ${depth})\n`));

        if (!options.dryRun && !options.compress && !options.yes && !await confirmNonEmptyOutput(output)) {
          console.log(chalk.yellow('\n  Nothing copied.\n'));
          return;
        }

        spinner.start();
        const result = await sortMedia({
          inputs: options.input.map(input => resolve(expandPath(input))),
          output,
          depth,
          extensions: mediaExtensions,
          compress: options.compress,
          renameSuffix: settings.renameSuffix,
          hashAlgorithm: settings.hashAlgorithm,
          concurrency: options.concurrency ?? settings.concurrency,
          includeHidden: settings.includeHidden,
          onConflict: options.onConflict ?? settings.onConflict,
          dryRun: options.dryRun,
          signal: controller.signal,
          onStage: (stage) => {
            spinner.text = STAGE_TEXT[stage];
          },
          onHashProgress: (hashed, total) => {
            spinner.text = renderProgressBar(hashed, total, { label: 'Hashing files' });
          },
        });
        spinner.succeed(options.dryRun ? 'Plan ready' : 'Done');

        if (options.dryRun) {
          console.log(chalk.bold('\n  Planned layout:\n'));
          console.log(renderPlacementTable(result.placements));
        }

        console.log('\n' + renderSummary(result, options.dryRun));

        if (result.archive) {
          console.log(chalk.green(`\n  Archive written: ${result.archive}\n`));
        } else if (!options.dryRun) {
          console.log(chalk.green(`\n  Files copied to ${output}\n`));
        } else if (options.compress) {
          console.log(chalk.dim(`\n  Would write ${output}${archiveExtension(options.compress)}\n`));
        }
      } catch (error) {
        spinner.stop();
        reportFailure(error);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
