import type { Tile, TileValue } from './Tile';
import { compareTiles, sameTile, sortTiles } from './Tile';
import { InvariantViolation } from './errors';

/** Concealed tiles, always kept sorted. */
export class MahjongHand {
  private tiles: Tile[] = [];

  constructor(init?: readonly Tile[]) {
    if (init) this.tiles = sortTiles(init);
  }

  add(tile: Tile) {
    const at = this.tiles.findIndex((t) => compareTiles(t, tile) > 0);
    if (at < 0) this.tiles.push(tile);
    else this.tiles.splice(at, 0, tile);
  }

  /** Removes one copy with the same value and red flag. */
  remove(tile: Tile): Tile {
    const i = this.tiles.findIndex((t) => sameTile(t, tile));
    if (i < 0) throw new InvariantViolation(`tile ${tile.value}${tile.red ? 'r' : ''} not in hand`);
    return this.removeAt(i);
  }

  removeAt(index: number): Tile {
    if (!Number.isInteger(index) || index < 0 || index >= this.tiles.length) {
      throw new InvariantViolation(`bad hand index ${index}`);
    }
    const [removed] = this.tiles.splice(index, 1);
    if (!removed) throw new InvariantViolation(`bad hand index ${index}`);
    return removed;
  }

  has(tile: Tile): boolean {
    return this.tiles.some((t) => sameTile(t, tile));
  }

  count(value: TileValue): number {
    let c = 0;
    for (const t of this.tiles) if (t.value === value) c++;
    return c;
  }

  get list(): Tile[] {
    return this.tiles.slice();
  }

  get size(): number {
    return this.tiles.length;
  }
}
