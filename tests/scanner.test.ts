import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import { join } from 'path';
import { mkdirSync, writeFileSync, rmSync, existsSync, symlinkSync } from 'fs';
import { tmpdir } from 'os';
import {
  assertDirectory,
  assertOutputDirectory,
  createExtensionFilter,
  discoverMedia,
} from '../src/core/scanner.js';
import { listDirectory } from '../src/utils/fs-safe.js';
import { InvalidDirectoryError } from '../src/utils/errors.js';
import { setLogLevel } from '../src/utils/logger.js';

beforeAll(() => setLogLevel('error'));
afterAll(() => setLogLevel('info'));

describe('createExtensionFilter', () => {
  const isMedia = createExtensionFilter(['.jpg', 'PNG', '.mp4']);

  it('matches extensions regardless of case', () => {
    expect(isMedia('/a/photo.JPG')).toBe(true);
    expect(isMedia('/a/photo.png')).toBe(true);
    expect(isMedia('/a/clip.Mp4')).toBe(true);
  });

  it('rejects other files', () => {
    expect(isMedia('/a/notes.txt')).toBe(false);
    expect(isMedia('/a/jpg')).toBe(false);
    expect(isMedia('/a/.jpg')).toBe(false);
  });
});

describe('Scanner', () => {
  const testDir = join(tmpdir(), 'mediasort-scanner-test-' + Date.now());
  const first = join(testDir, 'first');
  const second = join(testDir, 'second');

  beforeEach(() => {
    mkdirSync(join(first, 'sub'), { recursive: true });
    mkdirSync(second, { recursive: true });
    writeFileSync(join(first, 'b.jpg'), 'b');
    writeFileSync(join(first, 'a.jpg'), 'a');
    writeFileSync(join(first, 'notes.txt'), 'notes');
    writeFileSync(join(first, 'sub', 'c.png'), 'c');
    writeFileSync(join(first, '.hidden.jpg'), 'hidden');
    writeFileSync(join(second, 'd.JPG'), 'd');
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe('listDirectory', () => {
    it('lists files in name order at every level', async () => {
      const files = await listDirectory(first, { recursive: true, includeHidden: true });

      expect(files).toEqual([
        join(first, '.hidden.jpg'),
        join(first, 'a.jpg'),
        join(first, 'b.jpg'),
        join(first, 'notes.txt'),
        join(first, 'sub', 'c.png'),
      ]);
    });

    it('stays at the top level unless recursive', async () => {
      const files = await listDirectory(first);

      expect(files).toEqual([join(first, 'a.jpg'), join(first, 'b.jpg'), join(first, 'notes.txt')]);
    });

    it('lists symlinked files under the link path', async () => {
      symlinkSync(join(first, 'a.jpg'), join(first, 'link.jpg'));

      const files = await listDirectory(first);

      expect(files).toEqual([
        join(first, 'a.jpg'),
        join(first, 'b.jpg'),
        join(first, 'link.jpg'),
        join(first, 'notes.txt'),
      ]);
    });

    it('does not enter symlinked directories or follow broken links', async () => {
      symlinkSync(join(first, 'sub'), join(first, 'sub-link'));
      symlinkSync(join(testDir, 'nowhere.jpg'), join(first, 'broken.jpg'));

      const files = await listDirectory(first, { recursive: true });

      expect(files).toEqual([
        join(first, 'a.jpg'),
        join(first, 'b.jpg'),
        join(first, 'notes.txt'),
        join(first, 'sub', 'c.png'),
      ]);
    });

    it('returns nothing for a missing directory', async () => {
      expect(await listDirectory(join(testDir, 'missing'))).toEqual([]);
    });
  });

  describe('discoverMedia', () => {
    it('lists media root by root, hidden files included', async () => {
      const media = await discoverMedia([first, second], {
        predicate: createExtensionFilter(['.jpg', '.png']),
      });

      expect(media.map(f => f.path)).toEqual([
        join(first, '.hidden.jpg'),
        join(first, 'a.jpg'),
        join(first, 'b.jpg'),
        join(first, 'sub', 'c.png'),
        join(second, 'd.JPG'),
      ]);
      expect(media[4]).toMatchObject({ name: 'd.JPG', stem: 'd', extension: '.JPG' });
    });

    it('includes media reached through a symlink', async () => {
      const elsewhere = join(testDir, 'elsewhere');
      mkdirSync(elsewhere);
      writeFileSync(join(elsewhere, 'real.jpg'), 'real');
      symlinkSync(join(elsewhere, 'real.jpg'), join(second, '20230101.jpg'));

      const media = await discoverMedia([second], { predicate: createExtensionFilter(['.jpg']) });

      expect(media.map(f => f.path)).toEqual([join(second, '20230101.jpg'), join(second, 'd.JPG')]);
    });

    it('leaves hidden files out on request', async () => {
      const media = await discoverMedia([first], {
        predicate: createExtensionFilter(['.jpg']),
        includeHidden: false,
      });

      expect(media.map(f => f.name)).toEqual(['a.jpg', 'b.jpg']);
    });
  });

  describe('directory checks', () => {
    it('accepts an existing directory', async () => {
      await expect(assertDirectory(first)).resolves.toBeUndefined();
    });

    it('rejects a missing input', async () => {
      await expect(assertDirectory(join(testDir, 'missing'))).rejects.toBeInstanceOf(InvalidDirectoryError);
    });

    it('rejects a file given as a directory', async () => {
      const path = join(first, 'a.jpg');

      await expect(assertDirectory(path)).rejects.toMatchObject({
        title: 'Not a directory',
        path,
      });
      await expect(assertOutputDirectory(path)).rejects.toBeInstanceOf(InvalidDirectoryError);
    });

    it('allows an output directory that does not exist yet', async () => {
      await expect(assertOutputDirectory(join(testDir, 'new-output'))).resolves.toBeUndefined();
    });
  });
});
