import chalk from 'chalk';

/**
 * One line of progress: `label: ████░░░░  50% (2/4)`. The caller decides
 * where it goes; the sort command puts it in the spinner text.
 */
export function renderProgressBar(current: number, total: number, options: { width?: number; label?: string } = {}): string {
  const { width = 30, label } = options;
  const done = Math.min(current, total);
  const percentage = total > 0 ? done / total : 0;
  const filled = Math.round(width * percentage);
  const empty = width - filled;

  const bar = chalk.cyan('█'.repeat(filled)) + chalk.gray('░'.repeat(empty));
  const percent = (percentage * 100).toFixed(0).padStart(3);
  const counts = `${done}/${total}`;

  return label ? `${label}: ${bar} ${percent}% (${counts})` : `${bar} ${percent}% (${counts})`;
}
