import { homedir } from 'os';
import { join, basename, extname, relative, sep } from 'path';

export function expandTilde(path: string): string {
  if (path === '~' || path === '$HOME') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith('$HOME/')) {
    return join(homedir(), path.slice(6));
  }
  return path;
}

/**
 * Splits a filename at its last dot. A name whose only dot is the leading
 * one (".nomedia") has no extension.
 */
export function splitFilename(path: string): { name: string; stem: string; extension: string } {
  const name = basename(path);
  const extension = extname(name);
  const stem = extension ? name.slice(0, -extension.length) : name;

  return { name, stem, extension };
}

// Archive entries always use forward slashes.
export function toArchiveEntry(root: string, file: string): string {
  return relative(root, file).split(sep).join('/');
}
