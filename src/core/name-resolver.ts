import { groupBy } from '../utils/grouping.js';
import { createLogger } from '../utils/logger.js';
import type { MediaFile } from './media-file.js';

const logger = createLogger('names');

export interface NameGroup {
  name: string;
  files: MediaFile[];
}

export interface ResolvedNames {
  /** Files whose name appears once in the batch. */
  unique: MediaFile[];
  /** Groups of two or more files sharing a name, to be renumbered. */
  colliding: NameGroup[];
}

export function resolveNames(files: readonly MediaFile[]): ResolvedNames {
  const unique: MediaFile[] = [];
  const colliding: NameGroup[] = [];

  for (const [name, group] of groupBy(files, file => file.name)) {
    if (group.length === 1) {
      unique.push(group[0]);
    } else {
      colliding.push({ name, files: group });
    }
  }

  logger.debug(`${files.length} files: ${unique.length} unique names, ${colliding.length} colliding groups`);
  return { unique, colliding };
}
