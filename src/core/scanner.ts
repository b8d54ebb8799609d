import { stat } from 'fs/promises';
import { extname, resolve } from 'path';
import { listDirectory } from '../utils/fs-safe.js';
import { InvalidDirectoryError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { toMediaFile, type MediaFile } from './media-file.js';

const logger = createLogger('scanner');

export type FilePredicate = (path: string) => boolean;

export interface DiscoverOptions {
  predicate?: FilePredicate;
  includeHidden?: boolean;
  maxDepth?: number;
}

/**
 * Accepts paths whose extension is in the list, ignoring case. Entries may
 * be given with or without the leading dot.
 */
export function createExtensionFilter(extensions: readonly string[]): FilePredicate {
  const allowed = new Set(
    extensions.map(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase())
  );
  return (path: string) => allowed.has(extname(path).toLowerCase());
}

async function checkDirectory(path: string): Promise<'ok' | 'missing' | 'not-a-directory'> {
  try {
    const stats = await stat(path);
    return stats.isDirectory() ? 'ok' : 'not-a-directory';
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return 'missing';
    }
    throw error;
  }
}

export async function assertDirectory(path: string): Promise<void> {
  const status = await checkDirectory(path);
  if (status !== 'ok') {
    throw new InvalidDirectoryError(path, status);
  }
}

/**
 * The output directory may not exist yet, but if something is there it has
 * to be a directory.
 */
export async function assertOutputDirectory(path: string): Promise<void> {
  const status = await checkDirectory(path);
  if (status === 'not-a-directory') {
    throw new InvalidDirectoryError(path, status);
  }
}

/**
 * Lists the media files under every root, root by root, in a stable order.
 */
export async function discoverMedia(
  roots: readonly string[],
  options: DiscoverOptions = {}
): Promise<MediaFile[]> {
  const { predicate = () => true, includeHidden = true, maxDepth } = options;
  const media: MediaFile[] = [];

  for (const root of roots) {
    const dir = resolve(root);
    logger.info(`Listing media files in '${dir}'`);

    const files = await listDirectory(dir, { recursive: true, includeHidden, maxDepth });
    const accepted = files.filter(predicate);
    logger.info(`Found ${accepted.length} media files (${files.length - accepted.length} other files ignored)`);

    media.push(...accepted.map(toMediaFile));
  }

  return media;
}
