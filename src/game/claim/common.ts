import type { Tile, TileValue } from '../../domain/Tile';
import { sameTile, sortTiles } from '../../domain/Tile';

/** One representative per distinct (value, red) tile, sorted. */
export function distinctTiles(tiles: readonly Tile[]): Tile[] {
  const out: Tile[] = [];
  for (const t of sortTiles(tiles)) {
    if (!out.some((x) => sameTile(x, t))) out.push(t);
  }
  return out;
}

export function tilesOfValue(tiles: readonly Tile[], value: TileValue): Tile[] {
  return tiles.filter((t) => t.value === value);
}

/** Removes one matching tile from a copy; null when it is missing. */
export function withoutTile(tiles: readonly Tile[], tile: Tile): Tile[] | null {
  const i = tiles.findIndex((t) => sameTile(t, tile));
  if (i < 0) return null;
  return [...tiles.slice(0, i), ...tiles.slice(i + 1)];
}

/** Distinct two-tile choices of `value` from `tiles` (red and plain differ). */
export function pairChoices(tiles: readonly Tile[], value: TileValue): [Tile, Tile][] {
  const same = tilesOfValue(tiles, value);
  const red = same.filter((t) => t.red);
  const plain = same.filter((t) => !t.red);
  const out: [Tile, Tile][] = [];
  const p0 = plain[0];
  const p1 = plain[1];
  const r0 = red[0];
  const r1 = red[1];
  if (p0 && p1) out.push([p0, p1]);
  if (r0 && p0) out.push([r0, p0]);
  if (r0 && r1) out.push([r0, r1]);
  return out;
}
