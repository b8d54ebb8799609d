import { getDaysInMonth } from 'date-fns';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('dates');

export interface DateStrategy {
  name: string;
  /** Returns the date found in the filename, or null when there is none. */
  parse(filename: string): Date | null;
}

function isAsciiDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

/**
 * Returns every run of `width` consecutive digits in `text`, including
 * overlapping ones: a run of nine digits yields two windows.
 */
export function findDigitWindows(text: string, width = 8): string[] {
  const windows: string[] = [];
  let runStart = -1;

  for (let i = 0; i <= text.length; i++) {
    if (i < text.length && isAsciiDigit(text[i])) {
      if (runStart < 0) runStart = i;
      continue;
    }

    if (runStart >= 0) {
      for (let start = runStart; start + width <= i; start++) {
        windows.push(text.slice(start, start + width));
      }
      runStart = -1;
    }
  }

  return windows;
}

/**
 * Builds a local-midnight date, or null when the parts do not name a real
 * calendar day.
 */
export function calendarDate(year: number, month: number, day: number): Date | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  // setFullYear keeps years below 100 as they are.
  const date = new Date(0);
  date.setFullYear(year, month - 1, 1);
  date.setHours(0, 0, 0, 0);

  if (day > getDaysInMonth(date)) {
    return null;
  }

  date.setDate(day);
  return date;
}

/**
 * Reads a YYYYMMDD date from a filename. The filename must hold exactly one
 * eight-digit window; two or more are ambiguous and never resolved.
 */
export function parseYyyymmdd(filename: string): Date | null {
  const windows = findDigitWindows(filename, 8);

  if (windows.length !== 1) {
    logger.debug(
      windows.length === 0
        ? `No YYYYMMDD candidate in '${filename}'`
        : `${windows.length} YYYYMMDD candidates in '${filename}', ignoring`
    );
    return null;
  }

  const candidate = windows[0];
  const year = Number(candidate.slice(0, 4));
  const month = Number(candidate.slice(4, 6));
  const day = Number(candidate.slice(6, 8));
  const date = calendarDate(year, month, day);

  if (!date) {
    logger.debug(`'${candidate}' in '${filename}' is not a valid date`);
  }
  return date;
}

export const yyyymmddStrategy: DateStrategy = {
  name: 'yyyymmdd',
  parse: parseYyyymmdd,
};

export const DEFAULT_DATE_STRATEGIES: readonly DateStrategy[] = [yyyymmddStrategy];

/**
 * Tries each strategy in registration order and returns the first date
 * found.
 */
export class DateExtractor {
  private readonly strategies: DateStrategy[];

  constructor(strategies: readonly DateStrategy[] = DEFAULT_DATE_STRATEGIES) {
    this.strategies = [...strategies];
  }

  register(strategy: DateStrategy): this {
    this.strategies.push(strategy);
    return this;
  }

  get strategyNames(): string[] {
    return this.strategies.map(s => s.name);
  }

  extract(filename: string): Date | null {
    for (const strategy of this.strategies) {
      const date = strategy.parse(filename);
      if (date) {
        logger.debug(`${strategy.name}: '${filename}' -> ${date.toDateString()}`);
        return date;
      }
    }

    return null;
  }
}

const defaultExtractor = new DateExtractor();

export function extractDate(filename: string): Date | null {
  return defaultExtractor.extract(filename);
}
