import type { Tile, TileValue } from './Tile';
import type { Seat } from '../game/Player';

export type KanKind = 'open' | 'added' | 'closed';

export type Meld =
  | { type: 'chi'; tiles: [Tile, Tile, Tile]; fromSeat: Seat; calledTile: Tile }
  | { type: 'pon'; tiles: [Tile, Tile, Tile]; fromSeat: Seat; calledTile: Tile }
  | { type: 'kan'; kind: 'open' | 'added'; tiles: [Tile, Tile, Tile, Tile]; fromSeat: Seat; calledTile: Tile }
  | { type: 'kan'; kind: 'closed'; tiles: [Tile, Tile, Tile, Tile]; fromSeat: null; calledTile: null };

/** Lowest value in the meld (start of a run, or the repeated value). */
export function meldValue(m: Meld): TileValue {
  return Math.min(...m.tiles.map((t) => t.value));
}

/** A closed kan keeps the hand concealed; every other meld opens it. */
export function isOpenMeld(m: Meld): boolean {
  return !(m.type === 'kan' && m.kind === 'closed');
}
