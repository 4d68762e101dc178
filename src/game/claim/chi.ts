import type { Tile } from '../../domain/Tile';
import { rankOfIndex, suitOfIndex } from '../../domain/Tile';
import { distinctTiles, tilesOfValue } from './common';

/**
 * Two-tile choices from `hand` that make a run with `tile`. A red and a plain
 * five are separate choices. Honors cannot be chi'd.
 */
export function chiOptions(hand: readonly Tile[], tile: Tile): [Tile, Tile][] {
  if (suitOfIndex(tile.value) === 'z') return [];
  const v = tile.value;
  const r = rankOfIndex(v);

  const shapes: [number, number][] = [];
  if (r >= 3) shapes.push([v - 2, v - 1]);
  if (r >= 2 && r <= 8) shapes.push([v - 1, v + 1]);
  if (r <= 7) shapes.push([v + 1, v + 2]);

  const opts: [Tile, Tile][] = [];
  for (const [a, b] of shapes) {
    for (const ta of distinctTiles(tilesOfValue(hand, a))) {
      for (const tb of distinctTiles(tilesOfValue(hand, b))) opts.push([ta, tb]);
    }
  }
  return opts;
}
