import { createReadStream } from 'fs';
import type { Readable } from 'stream';
import { splitFilename } from '../utils/paths.js';

/**
 * A read-only reference to a media file. The core only ever reads the
 * content stream and the name parts; it never moves or mutates the file.
 */
export interface MediaFile {
  readonly path: string;
  /** Terminal name including the extension, e.g. `IMG_0001.jpg`. */
  readonly name: string;
  /** Name without the extension. */
  readonly stem: string;
  /** Extension with its leading dot, or an empty string. */
  readonly extension: string;
  open(): Readable;
}

export function toMediaFile(path: string): MediaFile {
  const { name, stem, extension } = splitFilename(path);

  return {
    path,
    name,
    stem,
    extension,
    open: () => createReadStream(path),
  };
}
