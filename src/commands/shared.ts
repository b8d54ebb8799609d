import chalk from 'chalk';
import type { z } from 'zod';
import { loadConfig, expandPath, type Config } from '../config.js';
import { MediaSortError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';

export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `--${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    console.error(chalk.red(`Invalid options:\n${detail}`));
    process.exit(1);
  }
  return result.data;
}

/**
 * Loads the config and applies the log level, with --debug taking
 * precedence over the configured level.
 */
export function prepareRun(options: { config?: string; debug?: boolean }): Config {
  const config = loadConfig(options.config ? expandPath(options.config) : undefined);
  setLogLevel(options.debug ? 'debug' : config.settings.logLevel);
  return config;
}

export function reportFailure(error: unknown): never {
  if (error instanceof MediaSortError) {
    console.error(chalk.red(`\n${error.format()}\n`));
  } else if (error instanceof Error && error.name === 'AbortError') {
    console.error(chalk.yellow('\n  Aborted before copying.\n'));
  } else {
    console.error(chalk.red('\n  Unexpected failure'));
    console.error(error);
  }
  process.exit(1);
}
