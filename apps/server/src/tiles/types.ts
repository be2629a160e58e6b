export const BACKGROUND_LABEL = 'background';

export interface Tile {
  tile_id: string;
  tile_path: string;
  x: number;
  y: number;
  width: number;
  height: number;
  tissue_ratio: number | null;
  label: string;
  label_confidence: number; // 0..1 overlap ratio of the winning annotation
  columns: Record<string, string>; // raw manifest row, in header order
}

export interface TileManifest {
  header: string[];
  tiles: Tile[];
}
