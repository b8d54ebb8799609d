import { dirname, join, isAbsolute } from 'path';
import { copyFile, constants, stat } from 'fs/promises';
import { ensureDir, exists } from '../utils/fs-safe.js';
import { hashFile, digestStream, areHashesEqual, DEFAULT_HASH_ALGORITHM, type HashAlgorithm } from '../utils/file-hash.js';
import { DestinationConflictError, InvalidDirectoryError, UnreadableFileError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Placement } from '../core/planner.js';

const logger = createLogger('copy');

export const CONFLICT_POLICIES = ['fail', 'skip', 'overwrite'] as const;
export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export interface CopyOptions {
  /** Prepended to relative destinations. */
  root?: string;
  /** What to do when a destination already exists with different content. */
  onConflict?: ConflictPolicy;
  algorithm?: HashAlgorithm;
  onProgress?: (copied: number, total: number, placement: Placement) => void;
}

export interface Conflict {
  placement: Placement;
  destination: string;
  /** The existing file has the same content as the source. */
  identical: boolean;
}

export interface CopyResult {
  copied: Placement[];
  skipped: Placement[];
}

export function resolveDestination(destination: string, root?: string): string {
  return root && !isAbsolute(destination) ? join(root, destination) : destination;
}

async function sameContent(placement: Placement, destination: string, algorithm: HashAlgorithm): Promise<boolean> {
  let sourceDigest: string;
  try {
    sourceDigest = await digestStream(placement.source.open(), algorithm);
  } catch (error) {
    throw new UnreadableFileError(placement.source.path, error);
  }

  let existingDigest: string;
  try {
    existingDigest = await hashFile(destination, algorithm);
  } catch (error) {
    throw new UnreadableFileError(destination, error);
  }

  return areHashesEqual(sourceDigest, existingDigest);
}

/**
 * Returns the nearest existing ancestor of `dir` when it is not a
 * directory, or null when the folders can be created.
 */
async function blockingAncestor(dir: string, cache: Map<string, string | null>): Promise<string | null> {
  const cached = cache.get(dir);
  if (cached !== undefined) {
    return cached;
  }

  let blocker: string | null;
  try {
    blocker = (await stat(dir)).isDirectory() ? null : dir;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw error;
    }
    const parent = dirname(dir);
    blocker = parent === dir ? null : await blockingAncestor(parent, cache);
  }

  cache.set(dir, blocker);
  return blocker;
}

/**
 * Lists paths that sit where a destination folder has to be created.
 */
export async function findBlockedFolders(placements: readonly Placement[], root?: string): Promise<string[]> {
  const cache = new Map<string, string | null>();
  const blocked = new Set<string>();

  for (const placement of placements) {
    const blocker = await blockingAncestor(dirname(resolveDestination(placement.destination, root)), cache);
    if (blocker) {
      blocked.add(blocker);
    }
  }

  return [...blocked];
}

/**
 * Finds placements whose destination is already taken on disk.
 */
export async function findConflicts(
  placements: readonly Placement[],
  root?: string,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
): Promise<Conflict[]> {
  const conflicts: Conflict[] = [];

  for (const placement of placements) {
    const destination = resolveDestination(placement.destination, root);
    if (await exists(destination)) {
      const identical = await sameContent(placement, destination, algorithm);
      conflicts.push({ placement, destination, identical });
    }
  }

  return conflicts;
}

/**
 * Copies every placement. Destination folders and files are checked before
 * the first copy, so a blocked folder or a `fail` conflict leaves the output
 * untouched.
 */
export async function copyPlacements(
  placements: readonly Placement[],
  options: CopyOptions = {}
): Promise<CopyResult> {
  const { root, onConflict = 'fail', algorithm = DEFAULT_HASH_ALGORITHM, onProgress } = options;

  const [blocked] = await findBlockedFolders(placements, root);
  if (blocked) {
    throw new InvalidDirectoryError(blocked, 'not-a-directory');
  }

  const conflicts = await findConflicts(placements, root, algorithm);
  const differing = conflicts.filter(c => !c.identical);

  if (differing.length > 0 && onConflict === 'fail') {
    throw new DestinationConflictError(differing.map(c => c.destination));
  }

  const skip = new Set<Placement>(
    conflicts
      .filter(c => c.identical || onConflict === 'skip')
      .map(c => c.placement)
  );

  const result: CopyResult = { copied: [], skipped: [] };
  let done = 0;

  logger.debug(`Copying ${placements.length - skip.size} files, skipping ${skip.size}`);

  for (const placement of placements) {
    if (skip.has(placement)) {
      logger.debug(`Skipping ${placement.source.path}: ${placement.destination} already exists`);
      result.skipped.push(placement);
    } else {
      const destination = resolveDestination(placement.destination, root);
      await ensureDir(dirname(destination));
      // Without overwrite, a file created since the check still makes this fail.
      await copyFile(
        placement.source.path,
        destination,
        onConflict === 'overwrite' ? 0 : constants.COPYFILE_EXCL
      );
      logger.debug(`SRC: ${placement.source.path}. DST: ${destination}`);
      result.copied.push(placement);
    }

    done++;
    onProgress?.(done, placements.length, placement);
  }

  return result;
}
