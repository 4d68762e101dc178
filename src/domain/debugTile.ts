import type { Tile } from './Tile';
import { parseTiles, sameTile, tileLabel } from './Tile';
import type { RedFives } from './Wall';
import { DEAD_WALL_SIZE, WALL_SIZE, makeTileSet } from './Wall';
import type { Seat } from '../game/Player';

export type StackedWall = {
  /** Starting hands by seat (up to 13 each, compact notation or tiles); short hands are padded. */
  hands?: Partial<Record<Seat, string | Tile[]>>;
  /** Live-wall draws after the deal, the first being the dealer's 14th tile. */
  draws?: string | Tile[];
  /** Dead wall from slot 0 (replacements first, then indicator pairs). */
  deadWall?: string | Tile[];
  dealer?: Seat;
  redFives?: RedFives;
  /** Live wall length; shorter than 122 leaves the unused tiles out of the wall. */
  liveSize?: number;
};

function asTiles(v: string | Tile[] | undefined): Tile[] {
  if (v === undefined) return [];
  return typeof v === 'string' ? parseTiles(v) : v.slice();
}

function take(pool: Tile[], tile: Tile): void {
  const i = pool.findIndex((t) => sameTile(t, tile));
  if (i < 0) throw new RangeError(`stacked wall uses ${tileLabel(tile)} more often than the set holds`);
  pool.splice(i, 1);
}

/**
 * Debug wall in draw order: deals the given hands one tile at a time from the
 * dealer, then the given draws, padding everything else from the unused tiles
 * in value order.
 */
export function makeStackedWallTiles(layout: StackedWall): Tile[] {
  const pool = makeTileSet(layout.redFives ?? [1, 1, 1]);
  const dealer = layout.dealer ?? 0;

  const hands: Tile[][] = ([0, 1, 2, 3] as const).map((s) => {
    const h = asTiles(layout.hands?.[s]);
    if (h.length > 13) throw new RangeError(`seat ${s} starts with ${h.length} tiles`);
    return h;
  });
  const draws = asTiles(layout.draws);
  const dead = asTiles(layout.deadWall);
  if (dead.length > DEAD_WALL_SIZE) throw new RangeError('dead wall holds 14 tiles');

  for (const t of [...hands.flat(), ...draws, ...dead]) take(pool, t);

  for (const h of hands) {
    while (h.length < 13) {
      const t = pool.shift();
      if (!t) throw new RangeError('ran out of tiles while padding hands');
      h.push(t);
    }
  }

  const live: Tile[] = [];
  for (let round = 0; round < 13; round++) {
    for (let k = 0; k < 4; k++) {
      const t = hands[(dealer + k) % 4]?.[round];
      if (t) live.push(t);
    }
  }
  live.push(...draws);

  const full = WALL_SIZE - DEAD_WALL_SIZE;
  const liveSize = layout.liveSize ?? full;
  if (live.length > liveSize) {
    throw new RangeError(`stacked wall specifies ${live.length} live tiles for a wall of ${liveSize}`);
  }
  while (live.length < liveSize) {
    const t = pool.shift();
    if (!t) break;
    live.push(t);
  }
  while (dead.length < DEAD_WALL_SIZE) {
    const t = pool.shift();
    if (!t) break;
    dead.push(t);
  }
  if (liveSize === full && pool.length !== 0) {
    throw new RangeError('stacked wall specifies more live draws than the wall holds');
  }
  return [...live, ...dead];
}
