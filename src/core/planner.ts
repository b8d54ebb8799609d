import { join } from 'path';
import { format } from 'date-fns';
import { groupBy } from '../utils/grouping.js';
import { createLogger } from '../utils/logger.js';
import { DateExtractor } from './date-extractor.js';
import { resolveNames } from './name-resolver.js';
import type { MediaFile } from './media-file.js';

const logger = createLogger('planner');

export const DEFAULT_RENAME_SUFFIX = '_#';
export const NO_DATE_BUCKET = 'no-date';

export const DEPTHS = ['none', 'year', 'month', 'day'] as const;
export type Depth = (typeof DEPTHS)[number];

export const DEPTH_LEVELS: Record<Depth, number> = {
  none: 0,
  year: 1,
  month: 2,
  day: 3,
};

// date-fns patterns, each level nested under the previous one
const BUCKET_FORMATS: Record<Exclude<Depth, 'none'>, string> = {
  year: 'yyyy',
  month: 'yyyy/MM - MMM',
  day: 'yyyy/MM - MMM/dd - EEE',
};

export interface Placement {
  source: MediaFile;
  destination: string;
}

export interface PlanOptions {
  outDir: string;
  depth: Depth;
  renameSuffix?: string;
  extractor?: DateExtractor;
}

function numberedName(stem: string, extension: string, index: number, width: number, suffix: string): string {
  return `${stem}${suffix}${String(index).padStart(width, '0')}${extension}`;
}

/**
 * Numbered names for a group of files sharing `stem + extension`, padded to
 * the width of `size`: 12 files give `a_#01.jpg` through `a_#12.jpg`.
 */
export function generateNames(
  stem: string,
  extension: string,
  size: number,
  suffix = DEFAULT_RENAME_SUFFIX
): string[] {
  const width = String(size).length;
  return Array.from({ length: size }, (_, i) => numberedName(stem, extension, i + 1, width, suffix));
}

/**
 * Maps every file to a distinct path under `destinationRoot`. Files with a
 * unique name keep it; files sharing a name are numbered in input order.
 *
 * A generated name can clash with a name already in the batch (`a.jpg`
 * twice next to an `a_#1.jpg`). Taken indices are skipped and members keep
 * input order, so the group becomes `a_#2.jpg`, `a_#3.jpg`. The padding
 * width stays that of the group size.
 */
export function planDestinations(
  files: readonly MediaFile[],
  destinationRoot = '',
  renameSuffix = DEFAULT_RENAME_SUFFIX
): Placement[] {
  const { unique, colliding } = resolveNames(files);
  const placements: Placement[] = [];
  const taken = new Set(unique.map(file => file.name));

  for (const file of unique) {
    placements.push({ source: file, destination: join(destinationRoot, file.name) });
  }

  for (const group of colliding) {
    const [first] = group.files;
    const size = group.files.length;
    const width = String(size).length;
    let index = 1;

    for (const file of group.files) {
      let name = numberedName(first.stem, first.extension, index++, width, renameSuffix);
      while (taken.has(name)) {
        name = numberedName(first.stem, first.extension, index++, width, renameSuffix);
      }
      taken.add(name);

      const destination = join(destinationRoot, name);
      logger.debug(`Renaming ${file.path} -> ${destination}`);
      placements.push({ source: file, destination });
    }
  }

  return placements;
}

export function formatBucket(date: Date, depth: Exclude<Depth, 'none'>): string {
  return format(date, BUCKET_FORMATS[depth]);
}

/**
 * Buckets files by the formatted date in their name. Files without a date
 * land in the `no-date` bucket; buckets keep first-seen order.
 */
export function bucketByDate(
  files: readonly MediaFile[],
  depth: Exclude<Depth, 'none'>,
  extractor: DateExtractor = new DateExtractor()
): Map<string, MediaFile[]> {
  return groupBy(files, file => {
    const date = extractor.extract(file.name);
    return date ? formatBucket(date, depth) : NO_DATE_BUCKET;
  });
}

export function planPlacements(files: readonly MediaFile[], options: PlanOptions): Placement[] {
  const { outDir, depth, renameSuffix = DEFAULT_RENAME_SUFFIX, extractor } = options;

  if (depth === 'none') {
    logger.debug('Planning without date folders');
    return planDestinations(files, outDir, renameSuffix);
  }

  const buckets = bucketByDate(files, depth, extractor);
  logger.debug(`Planning ${buckets.size} date folders`);

  const placements: Placement[] = [];
  for (const [bucket, bucketFiles] of buckets) {
    placements.push(...planDestinations(bucketFiles, join(outDir, bucket), renameSuffix));
  }
  return placements;
}
