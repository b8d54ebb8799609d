import { existsSync } from 'fs';
import { stat, mkdir, readdir, realpath, access, constants } from 'fs/promises';
import { join } from 'path';
import { createLogger } from './logger.js';

const logger = createLogger('fs-safe');

export interface ListOptions {
  recursive?: boolean;
  includeHidden?: boolean;
  maxDepth?: number;
}

export async function ensureDir(dirPath: string): Promise<void> {
  if (!existsSync(dirPath)) {
    await mkdir(dirPath, { recursive: true });
  }
}

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  const stats = await stat(path);
  return stats.isDirectory();
}

export async function isEmptyDirectory(path: string): Promise<boolean> {
  const entries = await readdir(path);
  return entries.length === 0;
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    const stats = await stat(linkPath);
    if (!stats.isFile()) {
      logger.debug(`Skipping symlink to a directory: ${linkPath}`);
    }
    return stats.isFile();
  } catch (error) {
    logger.warn(`Skipping broken symlink: ${linkPath}`, error instanceof Error ? error.message : error);
    return false;
  }
}

/**
 * Lists the files under a directory. Entries are visited in name order so
 * two listings of the same tree agree. Symlinks to files are listed under
 * the link's own path; symlinked directories are not entered, and real
 * paths are tracked to stop loops through bind mounts.
 */
export async function listDirectory(
  dirPath: string,
  options: ListOptions = {},
  currentDepth = 0,
  visitedPaths = new Set<string>()
): Promise<string[]> {
  const { recursive = false, includeHidden = false, maxDepth = Infinity } = options;

  if (currentDepth > maxDepth) {
    return [];
  }

  let realPath: string;
  let entries;
  try {
    realPath = await realpath(dirPath);
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Skipping unreadable directory: ${dirPath}`, error instanceof Error ? error.message : error);
    return [];
  }

  if (visitedPaths.has(realPath)) {
    return [];
  }
  visitedPaths.add(realPath);

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];

  for (const entry of entries) {
    if (!includeHidden && entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = join(dirPath, entry.name);

    if (entry.isSymbolicLink()) {
      if (await isLinkToFile(fullPath)) {
        files.push(fullPath);
      }
      continue;
    }

    if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isDirectory() && recursive) {
      files.push(...await listDirectory(fullPath, options, currentDepth + 1, visitedPaths));
    }
  }

  return files;
}
