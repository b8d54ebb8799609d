import { resolve } from 'path';
import { DEFAULT_HASH_ALGORITHM, type HashAlgorithm } from '../utils/file-hash.js';
import { createLogger } from '../utils/logger.js';
import { copyPlacements, type ConflictPolicy } from '../actions/copy.js';
import {
  compressDirectory,
  createStagingDirectory,
  deleteDirectory,
  type ArchiveFormat,
} from '../actions/archive.js';
import { assertDirectory, assertOutputDirectory, createExtensionFilter, discoverMedia } from './scanner.js';
import { deduplicate } from './deduplicator.js';
import type { DateExtractor } from './date-extractor.js';
import { planPlacements, DEFAULT_RENAME_SUFFIX, type Depth, type Placement } from './planner.js';
import type { MediaFile } from './media-file.js';

const logger = createLogger('sorter');

export type SortStage = 'discover' | 'deduplicate' | 'plan' | 'copy' | 'compress';

export interface SortOptions {
  inputs: string[];
  output: string;
  depth: Depth;
  extensions: string[];
  compress?: ArchiveFormat;
  renameSuffix?: string;
  hashAlgorithm?: HashAlgorithm;
  concurrency?: number;
  includeHidden?: boolean;
  onConflict?: ConflictPolicy;
  /** Plan only; nothing is written. */
  dryRun?: boolean;
  extractor?: DateExtractor;
  signal?: AbortSignal;
  onStage?: (stage: SortStage) => void;
  onHashProgress?: (hashed: number, total: number, file: MediaFile) => void;
}

export interface SortResult {
  discovered: number;
  unique: number;
  /** Destinations are relative to the output root. */
  placements: Placement[];
  copied: number;
  skipped: number;
  /** Path of the archive when compression was requested. */
  archive?: string;
}

async function copyOrCompress(
  placements: Placement[],
  options: SortOptions,
  output: string
): Promise<Pick<SortResult, 'copied' | 'skipped' | 'archive'>> {
  const { compress, onConflict, hashAlgorithm = DEFAULT_HASH_ALGORITHM, onStage } = options;

  if (!compress) {
    logger.info(`Copying files to '${output}'`);
    const { copied, skipped } = await copyPlacements(placements, {
      root: output,
      onConflict,
      algorithm: hashAlgorithm,
    });
    return { copied: copied.length, skipped: skipped.length };
  }

  const staging = await createStagingDirectory();
  try {
    logger.info(`Copying files to staging directory '${staging}'`);
    const { copied, skipped } = await copyPlacements(placements, { root: staging, algorithm: hashAlgorithm });

    onStage?.('compress');
    const archive = await compressDirectory(staging, output, compress);
    return { copied: copied.length, skipped: skipped.length, archive };
  } finally {
    await deleteDirectory(staging);
  }
}

/**
 * Discovers, deduplicates, plans and copies. Every check that can abort the
 * run (directories, unreadable files, destination conflicts) happens before
 * the first file is written.
 */
export async function sortMedia(options: SortOptions): Promise<SortResult> {
  const {
    inputs,
    depth,
    extensions,
    renameSuffix = DEFAULT_RENAME_SUFFIX,
    hashAlgorithm = DEFAULT_HASH_ALGORITHM,
    concurrency,
    includeHidden,
    dryRun = false,
    extractor,
    signal,
    onStage,
    onHashProgress,
  } = options;
  const output = resolve(options.output);

  for (const input of inputs) {
    await assertDirectory(input);
  }
  await assertOutputDirectory(output);

  onStage?.('discover');
  const media = await discoverMedia(inputs, {
    predicate: createExtensionFilter(extensions),
    includeHidden,
  });
  logger.info(`Total found: ${media.length} media files`);

  onStage?.('deduplicate');
  const unique = await deduplicate(media, {
    algorithm: hashAlgorithm,
    concurrency,
    signal,
    onProgress: onHashProgress,
  });
  logger.info(`Unique files: ${unique.length} (${media.length - unique.length} duplicates dropped)`);

  onStage?.('plan');
  // Destinations are relative to the output (or staging) root.
  const placements = planPlacements(unique, { outDir: '', depth, renameSuffix, extractor });

  const result: SortResult = {
    discovered: media.length,
    unique: unique.length,
    placements,
    copied: 0,
    skipped: 0,
  };

  if (dryRun) {
    logger.info('Dry run, nothing copied');
    return result;
  }

  signal?.throwIfAborted();
  onStage?.('copy');
  return { ...result, ...await copyOrCompress(placements, options, output) };
}
