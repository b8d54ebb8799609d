import Table from 'cli-table3';
import chalk from 'chalk';
import type { Placement } from '../core/planner.js';
import type { DuplicateGroup } from '../core/deduplicator.js';
import type { SortResult } from '../core/sorter.js';
import { truncate, indent } from './format.js';

function createTable(head: string[], colWidths?: number[]): Table.Table {
  return new Table({
    head: head.map(h => chalk.bold(h)),
    colWidths,
    wordWrap: true,
    style: {
      head: [],
      border: ['gray'],
    },
  });
}

export function renderPlacementTable(placements: readonly Placement[], limit = 50): string {
  const table = createTable(['Source', 'Destination'], [50, 50]);

  for (const { source, destination } of placements.slice(0, limit)) {
    const renamed = source.name !== destination.split(/[\\/]/).pop();
    table.push([
      truncate(source.path, 48),
      renamed ? chalk.yellow(destination) : destination,
    ]);
  }

  const lines = [indent(table.toString())];
  if (placements.length > limit) {
    lines.push(chalk.dim(`  ... and ${placements.length - limit} more files`));
  }
  return lines.join('\n');
}

export function renderSummary(result: SortResult, dryRun = false): string {
  const table = createTable(['', 'Files'], [24, 10]);

  table.push(
    ['Media files found', String(result.discovered)],
    ['Duplicates dropped', String(result.discovered - result.unique)],
    ['Unique files', String(result.unique)],
    [dryRun ? 'Would copy' : 'Copied', String(dryRun ? result.placements.length : result.copied)],
  );
  if (result.skipped > 0) {
    table.push(['Already in place', String(result.skipped)]);
  }

  return indent(table.toString());
}

export function renderDuplicateGroups(groups: readonly DuplicateGroup[]): string {
  const lines: string[] = [];

  groups.forEach((group, i) => {
    lines.push(chalk.yellow(`  Group ${i + 1}`) + chalk.dim(` (${group.digest.slice(0, 12)}...)`));
    group.files.forEach((file, j) => {
      lines.push(j === 0 ? `    ${chalk.green('keep')} ${file.path}` : chalk.dim(`    drop ${file.path}`));
    });
    lines.push('');
  });

  const dropped = groups.reduce((sum, group) => sum + group.files.length - 1, 0);
  lines.push(chalk.yellow(`  ${groups.length} duplicate groups, ${dropped} files would be dropped`));

  return lines.join('\n');
}
