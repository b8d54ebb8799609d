import { createReadStream } from 'fs';
import { createHash } from 'crypto';
import type { Readable } from 'stream';

export const HASH_ALGORITHMS = ['sha256', 'sha384', 'sha512', 'sha1', 'md5'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';

/**
 * Hashes a byte stream chunk by chunk. The stream is destroyed if it fails,
 * which releases the underlying file descriptor.
 */
export function digestStream(stream: Readable, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): Promise<string> {
  const hasher = createHash(algorithm);

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk: Buffer | string) => {
      hasher.update(chunk);
    });

    stream.on('end', () => {
      resolve(hasher.digest('hex'));
    });

    stream.on('error', (error) => {
      stream.destroy();
      reject(error);
    });
  });
}

export function hashFile(filePath: string, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): Promise<string> {
  return digestStream(createReadStream(filePath), algorithm);
}

export function areHashesEqual(hash1: string, hash2: string): boolean {
  return hash1.toLowerCase() === hash2.toLowerCase();
}
