import { Readable } from 'stream';
import { createHash } from 'crypto';
import { toMediaFile, type MediaFile } from '../src/core/media-file.js';

/**
 * A media file whose content lives in memory. The path is only used for
 * naming; nothing is read from disk.
 */
export function memoryFile(path: string, content: string | Buffer = path, delayMs = 0): MediaFile {
  const bytes = Buffer.isBuffer(content) ? content : Buffer.from(content);
  const { name, stem, extension } = toMediaFile(path);

  return {
    path,
    name,
    stem,
    extension,
    open: () =>
      new Readable({
        read() {
          setTimeout(() => {
            this.push(bytes);
            this.push(null);
          }, delayMs);
        },
      }),
  };
}

export function unreadableFile(path: string, message = 'EACCES: permission denied'): MediaFile {
  return {
    ...toMediaFile(path),
    open: () =>
      new Readable({
        read() {
          this.destroy(new Error(message));
        },
      }),
  };
}

export function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}
