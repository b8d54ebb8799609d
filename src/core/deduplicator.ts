import pLimit from 'p-limit';
import { digestStream, DEFAULT_HASH_ALGORITHM, type HashAlgorithm } from '../utils/file-hash.js';
import { UnreadableFileError } from '../utils/errors.js';
import { groupBy } from '../utils/grouping.js';
import { createLogger } from '../utils/logger.js';
import type { MediaFile } from './media-file.js';

const logger = createLogger('deduplicator');

export interface DuplicateGroup {
  digest: string;
  files: MediaFile[];
}

export interface DeduplicateOptions {
  algorithm?: HashAlgorithm;
  /** Number of files hashed at the same time. */
  concurrency?: number;
  /** Once aborted, no further file is opened. Reads already running finish. */
  signal?: AbortSignal;
  onProgress?: (hashed: number, total: number, file: MediaFile) => void;
}

async function digestFile(file: MediaFile, algorithm: HashAlgorithm): Promise<string> {
  try {
    return await digestStream(file.open(), algorithm);
  } catch (error) {
    throw new UnreadableFileError(file.path, error);
  }
}

/**
 * Groups files by content digest. Digests may be computed concurrently, but
 * groups are always built in input order: digest order follows the first
 * file seen with that digest, and files keep their input order inside a
 * group.
 */
export async function groupByDigest(
  files: readonly MediaFile[],
  options: DeduplicateOptions = {}
): Promise<DuplicateGroup[]> {
  const { algorithm = DEFAULT_HASH_ALGORITHM, concurrency = 4, signal, onProgress } = options;
  const limit = pLimit(Math.max(1, concurrency));
  let hashed = 0;

  logger.debug(`Hashing ${files.length} files (${algorithm}, concurrency ${concurrency})`);

  const tasks = files.map(file =>
    limit(async () => {
      signal?.throwIfAborted();
      const digest = await digestFile(file, algorithm);
      hashed++;
      logger.debug(`${file.path}: ${digest}`);
      onProgress?.(hashed, files.length, file);
      return digest;
    })
  );

  let digests: string[];
  try {
    digests = await Promise.all(tasks);
  } catch (error) {
    limit.clearQueue();
    throw error;
  }

  const groups = groupBy(files, (_file, index) => digests[index]);
  logger.debug(`Found ${groups.size} distinct contents among ${files.length} files`);

  return [...groups].map(([digest, group]) => ({ digest, files: group }));
}

/**
 * Keeps the first file of every group of identical files.
 */
export async function deduplicate(
  files: readonly MediaFile[],
  options: DeduplicateOptions = {}
): Promise<MediaFile[]> {
  const groups = await groupByDigest(files, options);
  return groups.map(group => group.files[0]);
}

export function duplicatesOnly(groups: readonly DuplicateGroup[]): DuplicateGroup[] {
  return groups.filter(group => group.files.length > 1);
}
