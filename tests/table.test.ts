import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { renderDuplicateGroups, renderPlacementTable, renderSummary } from '../src/ui/table.js';
import { toMediaFile } from '../src/core/media-file.js';

describe('renderPlacementTable', () => {
  const placements = [
    { source: toMediaFile('/in/a.jpg'), destination: join('2023', 'a.jpg') },
    { source: toMediaFile('/in/b.jpg'), destination: join('2023', 'b_#1.jpg') },
  ];

  it('lists sources next to destinations', () => {
    const output = renderPlacementTable(placements);

    expect(output).toContain('/in/a.jpg');
    expect(output).toContain(join('2023', 'b_#1.jpg'));
  });

  it('mentions files beyond the limit', () => {
    expect(renderPlacementTable(placements, 1)).toContain('... and 1 more files');
  });
});

describe('renderSummary', () => {
  it('counts dropped duplicates', () => {
    const output = renderSummary({ discovered: 5, unique: 3, placements: [], copied: 3, skipped: 1 });

    expect(output).toContain('Duplicates dropped');
    expect(output).toContain('Already in place');
  });
});

describe('renderDuplicateGroups', () => {
  it('marks the kept file and totals the dropped ones', () => {
    const output = renderDuplicateGroups([
      { digest: 'ab'.repeat(32), files: [toMediaFile('/in/a.jpg'), toMediaFile('/in/b.jpg'), toMediaFile('/in/c.jpg')] },
    ]);

    expect(output).toContain('/in/a.jpg');
    expect(output).toContain('drop /in/b.jpg');
    expect(output).toContain('1 duplicate groups, 2 files would be dropped');
  });
});
