import { createReadStream, createWriteStream } from 'fs';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { pipeline } from 'stream/promises';
import JSZip from 'jszip';
import { create as createTar } from 'tar';
import compressjs from 'compressjs';
import { ensureDir, exists, listDirectory } from '../utils/fs-safe.js';
import { toArchiveEntry } from '../utils/paths.js';
import { DestinationConflictError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('archive');

export const ARCHIVE_FORMATS = ['zip', 'tar', 'gztar', 'bztar'] as const;
export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number];

const EXTENSIONS: Record<ArchiveFormat, string> = {
  zip: '.zip',
  tar: '.tar',
  gztar: '.tar.gz',
  bztar: '.tar.bz2',
};

export function archiveExtension(format: ArchiveFormat): string {
  return EXTENSIONS[format];
}

async function writeZip(directory: string, archivePath: string): Promise<void> {
  const zip = new JSZip();
  const files = await listDirectory(directory, { recursive: true, includeHidden: true });

  for (const file of files) {
    zip.file(toArchiveEntry(directory, file), createReadStream(file));
  }

  await pipeline(
    zip.generateNodeStream({ type: 'nodebuffer', streamFiles: true, compression: 'DEFLATE' }),
    createWriteStream(archivePath)
  );
}

async function writeTar(directory: string, archivePath: string, gzip: boolean): Promise<void> {
  const entries = (await readdir(directory)).sort();
  await createTar({ file: archivePath, cwd: directory, gzip, portable: true }, entries);
}

// The bzip2 encoder works on whole buffers, so the tar stream is collected first.
async function writeBzippedTar(directory: string, archivePath: string): Promise<void> {
  const entries = (await readdir(directory)).sort();
  const chunks: Uint8Array[] = [];

  for await (const chunk of createTar({ cwd: directory, portable: true }, entries)) {
    chunks.push(chunk);
  }

  const compressed = compressjs.Bzip2.compressFile(Buffer.concat(chunks));
  await writeFile(archivePath, Buffer.from(compressed));
}

/**
 * Packs the contents of `directory` into `destinationBase` plus the format's
 * extension and returns the archive path. An existing archive is never
 * replaced.
 */
export async function compressDirectory(
  directory: string,
  destinationBase: string,
  format: ArchiveFormat = 'zip'
): Promise<string> {
  const archivePath = destinationBase + archiveExtension(format);

  if (await exists(archivePath)) {
    throw new DestinationConflictError([archivePath]);
  }
  await ensureDir(dirname(archivePath));

  logger.info(`Compressing '${directory}' into '${archivePath}'`);

  switch (format) {
    case 'zip':
      await writeZip(directory, archivePath);
      break;
    case 'tar':
      await writeTar(directory, archivePath, false);
      break;
    case 'gztar':
      await writeTar(directory, archivePath, true);
      break;
    case 'bztar':
      await writeBzippedTar(directory, archivePath);
      break;
  }

  return archivePath;
}

export async function createStagingDirectory(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'mediasort-'));
}

export async function deleteDirectory(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
  logger.debug(`Deleted '${directory}'`);
}
