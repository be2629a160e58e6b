import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { InputError } from '../utils/errors';
import { loadTileManifest, parseTileManifest, saveTileManifest, tileManifestToCsv } from './manifest';

const MANIFEST = [
  'tile_id,tile_path,x,y,width,height,tissue_ratio,slide',
  't1,tiles/t1.png,0,0,256,256,0.91,"slide 01, left"',
  't2,tiles/t2.png,256,0,256,256,,slide 01',
].join('\n');

describe('parseTileManifest', () => {
  it('reads tile geometry and optional columns', () => {
    const { header, tiles } = parseTileManifest(MANIFEST);

    expect(header).toEqual(['tile_id', 'tile_path', 'x', 'y', 'width', 'height', 'tissue_ratio', 'slide']);
    expect(tiles[0]).toMatchObject({
      tile_id: 't1',
      tile_path: 'tiles/t1.png',
      x: 0,
      y: 0,
      width: 256,
      height: 256,
      tissue_ratio: 0.91,
      label: 'background',
      label_confidence: 0,
    });
    expect(tiles[1].tissue_ratio).toBeNull();
    expect(tiles[0].columns.slide).toBe('slide 01, left');
  });

  it('defaults the optional columns when they are absent', () => {
    const { tiles } = parseTileManifest('x,y,width,height\n10,20,30,40\n');
    expect(tiles[0]).toMatchObject({ tile_id: '', tile_path: '', tissue_ratio: null, x: 10, y: 20, width: 30, height: 40 });
  });

  it('names the missing required columns', () => {
    expect(() => parseTileManifest('tile_id,x,y,width\nt1,0,0,256\n')).toThrow(
      'Tile manifest is missing required columns: height',
    );
  });

  it('names the row and column of a non-numeric cell', () => {
    const text = 'x,y,width,height\n0,0,256,256\nabc,0,256,256\n';
    expect(() => parseTileManifest(text)).toThrow(InputError);
    expect(() => parseTileManifest(text)).toThrow("Row 3: column 'x' is not a number (got 'abc')");
  });
});

describe('tileManifestToCsv', () => {
  it('appends label columns after the input columns', () => {
    const { header, tiles } = parseTileManifest(MANIFEST);
    const labeled = [{ ...tiles[0], label: 'primary', label_confidence: 0.625 }, tiles[1]];

    expect(tileManifestToCsv(header, labeled).split('\n')).toEqual([
      'tile_id,tile_path,x,y,width,height,tissue_ratio,slide,label,label_confidence',
      't1,tiles/t1.png,0,0,256,256,0.91,"slide 01, left",primary,0.625',
      't2,tiles/t2.png,256,0,256,256,,slide 01,background,0',
      '',
    ]);
  });

  it('replaces existing label columns in place', () => {
    const { header, tiles } = parseTileManifest('x,y,width,height,label\n0,0,1,1,old\n');
    const csv = tileManifestToCsv(header, [{ ...tiles[0], label: 'antral', label_confidence: 1 }]);
    expect(csv).toBe('x,y,width,height,label,label_confidence\n0,0,1,1,antral,1\n');
  });
});

describe('loadTileManifest / saveTileManifest', () => {
  it('round trips through the file system', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'manifest-'));
    try {
      const input = path.join(dir, 'slide01.csv');
      const output = path.join(dir, 'slide01_labeled.csv');
      fs.writeFileSync(input, MANIFEST);

      const { header, tiles } = loadTileManifest(input);
      saveTileManifest(output, header, tiles);

      const reloaded = loadTileManifest(output);
      expect(reloaded.header).toEqual([...header, 'label', 'label_confidence']);
      expect(reloaded.tiles.map(t => t.tile_id)).toEqual(['t1', 't2']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
