import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { makeTile } from '../test/fixtures';
import { exportTileLabelsForReview, REVIEW_COLUMNS, sampleForReview } from './review';

// 1000 tiles on a 40 × 25 grid with confidences cycling through 0..0.99
const grid = Array.from({ length: 1000 }, (_, i) =>
  makeTile((i % 40) * 256, Math.floor(i / 40) * 256, 256, 256, {
    tile_id: `t${i}`,
    label: i % 3 === 0 ? 'background' : 'primary',
    label_confidence: i % 3 === 0 ? 0 : (i % 100) / 100,
  }),
);

describe('sampleForReview', () => {
  it('draws exactly the requested number of distinct tiles', () => {
    const rows = sampleForReview(grid, 100);
    expect(rows).toHaveLength(100);
    expect(new Set(rows.map(r => r.tile_id)).size).toBe(100);
  });

  it('draws nothing for a negative sample size', () => {
    expect(sampleForReview(grid.slice(0, 10), -1)).toEqual([]);
  });

  it('sorts the sample by ascending confidence', () => {
    const confidences = sampleForReview(grid, 100).map(r => r.label_confidence);
    expect(confidences).toEqual([...confidences].sort((a, b) => a - b));
  });

  it('returns the same rows for the same seed', () => {
    expect(sampleForReview(grid, 100, 42)).toEqual(sampleForReview(grid, 100, 42));
  });

  it('draws a different sample for a different seed', () => {
    const ids = (seed: number) => sampleForReview(grid, 100, seed).map(r => r.tile_id).sort();
    expect(ids(7)).not.toEqual(ids(42));
  });

  it('keeps every tile when there are no more than the sample size', () => {
    const tiles = [
      makeTile(0, 0, 10, 10, { tile_id: 'a', label: 'primary', label_confidence: 0.9 }),
      makeTile(10, 0, 10, 10, { tile_id: 'b', label_confidence: 0 }),
      makeTile(20, 0, 10, 10, { tile_id: 'c', label: 'antral', label_confidence: 0.55 }),
    ];
    expect(sampleForReview(tiles, 3).map(r => r.tile_id)).toEqual(['b', 'c', 'a']);
    expect(sampleForReview(tiles, 100).map(r => r.tile_id)).toEqual(['b', 'c', 'a']);
  });

  it('projects the review columns only', () => {
    const [row] = sampleForReview([makeTile(0, 0)], 10);
    expect(Object.keys(row)).toEqual([...REVIEW_COLUMNS]);
  });
});

describe('exportTileLabelsForReview', () => {
  it('writes the review CSV lowest confidence first', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-'));
    const out = path.join(dir, 'review.csv');
    const tiles = [
      makeTile(0, 0, 256, 256, { tile_id: 'a', label: 'primary', label_confidence: 0.75 }),
      makeTile(256, 0, 256, 256, { tile_id: 'b', tissue_ratio: null }),
    ];

    try {
      const rows = exportTileLabelsForReview(tiles, out, 100, 42);
      expect(rows).toHaveLength(2);
      expect(fs.readFileSync(out, 'utf8')).toBe(
        'tile_id,tile_path,label,label_confidence,x,y,tissue_ratio\n' +
        'b,tiles/b.png,background,0,256,0,\n' +
        'a,tiles/a.png,primary,0.75,0,0,0.8\n',
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
