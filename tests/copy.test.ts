import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll, vi } from 'vitest';
import { join } from 'path';
import { mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { copyPlacements, findBlockedFolders, findConflicts, resolveDestination } from '../src/actions/copy.js';
import { toMediaFile } from '../src/core/media-file.js';
import { DestinationConflictError, InvalidDirectoryError } from '../src/utils/errors.js';
import { setLogLevel } from '../src/utils/logger.js';
import type { Placement } from '../src/core/planner.js';

beforeAll(() => setLogLevel('error'));
afterAll(() => setLogLevel('info'));

describe('resolveDestination', () => {
  it('joins relative destinations onto the root', () => {
    expect(resolveDestination(join('2023', 'a.jpg'), '/out')).toBe(join('/out', '2023', 'a.jpg'));
  });

  it('leaves absolute destinations alone', () => {
    expect(resolveDestination('/elsewhere/a.jpg', '/out')).toBe('/elsewhere/a.jpg');
    expect(resolveDestination('a.jpg')).toBe('a.jpg');
  });
});

describe('copyPlacements', () => {
  const testDir = join(tmpdir(), 'mediasort-copy-test-' + Date.now());
  const input = join(testDir, 'input');
  const output = join(testDir, 'output');

  function place(name: string, destination: string): Placement {
    return { source: toMediaFile(join(input, name)), destination };
  }

  beforeEach(() => {
    mkdirSync(input, { recursive: true });
    writeFileSync(join(input, 'a.jpg'), 'alpha');
    writeFileSync(join(input, 'b.jpg'), 'beta');
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it('copies into nested folders under the root', async () => {
    const placements = [place('a.jpg', join('2023', 'a.jpg')), place('b.jpg', join('no-date', 'b_#1.jpg'))];

    const result = await copyPlacements(placements, { root: output });

    expect(result.copied).toEqual(placements);
    expect(result.skipped).toEqual([]);
    expect(readFileSync(join(output, '2023', 'a.jpg'), 'utf-8')).toBe('alpha');
    expect(readFileSync(join(output, 'no-date', 'b_#1.jpg'), 'utf-8')).toBe('beta');
  });

  it('leaves the source files in place', async () => {
    await copyPlacements([place('a.jpg', 'a.jpg')], { root: output });

    expect(readFileSync(join(input, 'a.jpg'), 'utf-8')).toBe('alpha');
  });

  it('reports progress after each file', async () => {
    const onProgress = vi.fn();
    const placements = [place('a.jpg', 'a.jpg'), place('b.jpg', 'b.jpg')];

    await copyPlacements(placements, { root: output, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [1, 2, placements[0]],
      [2, 2, placements[1]],
    ]);
  });

  describe('existing destinations', () => {
    beforeEach(() => {
      mkdirSync(output, { recursive: true });
    });

    it('skips a destination that already holds the same content', async () => {
      writeFileSync(join(output, 'a.jpg'), 'alpha');
      const placements = [place('a.jpg', 'a.jpg'), place('b.jpg', 'b.jpg')];

      const result = await copyPlacements(placements, { root: output });

      expect(result.skipped).toEqual([placements[0]]);
      expect(result.copied).toEqual([placements[1]]);
    });

    it('copies nothing when a destination differs', async () => {
      writeFileSync(join(output, 'b.jpg'), 'something else');
      const placements = [place('a.jpg', 'a.jpg'), place('b.jpg', 'b.jpg')];

      const error = await copyPlacements(placements, { root: output }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DestinationConflictError);
      expect(error).toMatchObject({ paths: [join(output, 'b.jpg')] });
      expect(existsSync(join(output, 'a.jpg'))).toBe(false);
      expect(readFileSync(join(output, 'b.jpg'), 'utf-8')).toBe('something else');
    });

    it('keeps the existing file with the skip policy', async () => {
      writeFileSync(join(output, 'b.jpg'), 'something else');
      const placements = [place('a.jpg', 'a.jpg'), place('b.jpg', 'b.jpg')];

      const result = await copyPlacements(placements, { root: output, onConflict: 'skip' });

      expect(result.copied).toEqual([placements[0]]);
      expect(result.skipped).toEqual([placements[1]]);
      expect(readFileSync(join(output, 'b.jpg'), 'utf-8')).toBe('something else');
    });

    it('replaces the existing file with the overwrite policy', async () => {
      writeFileSync(join(output, 'b.jpg'), 'something else');

      const result = await copyPlacements([place('b.jpg', 'b.jpg')], { root: output, onConflict: 'overwrite' });

      expect(result.copied).toHaveLength(1);
      expect(readFileSync(join(output, 'b.jpg'), 'utf-8')).toBe('beta');
    });

    it('copies nothing when a file sits where a folder is needed', async () => {
      writeFileSync(join(output, '2023'), 'not a folder');
      const placements = [place('a.jpg', join('2022', 'a.jpg')), place('b.jpg', join('2023', 'b.jpg'))];

      const error = await copyPlacements(placements, { root: output }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidDirectoryError);
      expect(error).toMatchObject({ path: join(output, '2023') });
      expect(existsSync(join(output, '2022'))).toBe(false);
    });

    it('finds a blocking file further up the destination path', async () => {
      writeFileSync(join(output, '2023'), 'not a folder');
      const placements = [
        place('a.jpg', join('2023', '04 - Apr', 'a.jpg')),
        place('b.jpg', join('2023', '05 - May', 'b.jpg')),
        place('b.jpg', join('2024', 'b.jpg')),
      ];

      expect(await findBlockedFolders(placements, output)).toEqual([join(output, '2023')]);
    });

    it('lists conflicts with whether the content matches', async () => {
      writeFileSync(join(output, 'a.jpg'), 'alpha');
      writeFileSync(join(output, 'b.jpg'), 'other');
      const placements = [place('a.jpg', 'a.jpg'), place('b.jpg', 'b.jpg')];

      const conflicts = await findConflicts(placements, output);

      expect(conflicts.map(c => [c.destination, c.identical])).toEqual([
        [join(output, 'a.jpg'), true],
        [join(output, 'b.jpg'), false],
      ]);
    });
  });
});
