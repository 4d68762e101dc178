import type { Tile, TileValue } from './Tile';
import { FIVE_VALUES, TILE_KINDS, makeTile, nextDoraValue } from './Tile';
import type { Rng } from './random';
import { shuffle } from './random';

export const WALL_SIZE = 136;
export const DEAD_WALL_SIZE = 14;
export const MAX_REPLACEMENTS = 4;
export const MAX_INDICATORS = 5;

export type RedFives = readonly [number, number, number];

/** The 136 tiles in value order; `redFives[s]` copies of each suit's five are red. */
export function makeTileSet(redFives: RedFives): Tile[] {
  const tiles: Tile[] = [];
  for (let v = 0; v < TILE_KINDS; v++) {
    const suit = FIVE_VALUES.findIndex((f) => f === v);
    const reds = suit >= 0 ? Math.max(0, Math.min(4, redFives[suit] ?? 0)) : 0;
    for (let k = 0; k < 4; k++) tiles.push(makeTile(v, k < reds));
  }
  return tiles;
}

/**
 * Live wall drawn from the head, dead wall of 14 at the tail.
 * Dead wall slots 0-3 are replacement tiles, 4+2i / 5+2i the i-th dora / ura indicators.
 */
export class Wall {
  private readonly live: Tile[];
  private readonly dead: Tile[];
  private head = 0;
  private replacementsDrawn = 0;
  private revealed = 1;
  readonly size: number;

  private constructor(tiles: Tile[]) {
    if (tiles.length < DEAD_WALL_SIZE) {
      throw new RangeError(`wall needs at least ${DEAD_WALL_SIZE} tiles for the dead wall, got ${tiles.length}`);
    }
    this.size = tiles.length;
    this.live = tiles.slice(0, tiles.length - DEAD_WALL_SIZE);
    this.dead = tiles.slice(tiles.length - DEAD_WALL_SIZE);
  }

  static shuffled(redFives: RedFives, rng: Rng): Wall {
    return new Wall(shuffle(makeTileSet(redFives), rng));
  }

  /** Tiles in draw order; the last 14 form the dead wall. */
  static fromTiles(tiles: readonly Tile[]): Wall {
    return new Wall(tiles.slice());
  }

  draw(): Tile | null {
    const t = this.live[this.head];
    if (!t) return null;
    this.head++;
    return t;
  }

  drawReplacement(): Tile | null {
    if (this.replacementsDrawn >= MAX_REPLACEMENTS) return null;
    const t = this.dead[this.replacementsDrawn];
    if (!t) return null;
    this.replacementsDrawn++;
    return t;
  }

  /** Flips the next dora/ura pair; null once all five are showing. */
  revealNewDora(): Tile | null {
    if (this.revealed >= MAX_INDICATORS) return null;
    this.revealed++;
    return this.dead[4 + 2 * (this.revealed - 1)] ?? null;
  }

  get liveCount(): number {
    return this.live.length - this.head;
  }

  get replacementCount(): number {
    return MAX_REPLACEMENTS - this.replacementsDrawn;
  }

  /** Tiles still physically in the wall (live plus undrawn dead wall). */
  get remaining(): number {
    return this.liveCount + this.dead.length - this.replacementsDrawn;
  }

  get doraIndicators(): Tile[] {
    return this.indicators(4);
  }

  get uraIndicators(): Tile[] {
    return this.indicators(5);
  }

  get doraValues(): TileValue[] {
    return this.doraIndicators.map((t) => nextDoraValue(t.value));
  }

  get uraValues(): TileValue[] {
    return this.uraIndicators.map((t) => nextDoraValue(t.value));
  }

  private indicators(offset: number): Tile[] {
    const out: Tile[] = [];
    for (let i = 0; i < this.revealed; i++) {
      const t = this.dead[offset + 2 * i];
      if (t) out.push(t);
    }
    return out;
  }
}
