import type { Tile, TileValue } from '../domain/Tile';
import { tileLabel, valueLabel } from '../domain/Tile';
import type { KanKind } from '../domain/Meld';

export type Action =
  | { type: 'discard'; tile: Tile }
  | { type: 'riichi'; tile: Tile }
  | { type: 'tsumo' }
  | { type: 'kan'; kind: KanKind; value: TileValue }
  | { type: 'ron' }
  | { type: 'pon'; tiles: [Tile, Tile] }
  | { type: 'chi'; tiles: [Tile, Tile] }
  | { type: 'pass' }
  | { type: 'abortiveDraw' };

/** Stable string identity; two actions are the same choice iff their keys match. */
export function actionKey(a: Action): string {
  switch (a.type) {
    case 'discard':
    case 'riichi':
      return `${a.type}:${tileLabel(a.tile)}`;
    case 'kan':
      return `kan:${a.kind}:${valueLabel(a.value)}`;
    case 'pon':
    case 'chi':
      return `${a.type}:${tileLabel(a.tiles[0])}${tileLabel(a.tiles[1])}`;
    case 'tsumo':
    case 'ron':
    case 'pass':
    case 'abortiveDraw':
      return a.type;
  }
}

export function sameAction(a: Action, b: Action): boolean {
  return actionKey(a) === actionKey(b);
}

/** Claim class used when resolving simultaneous responses. */
export function claimPriority(a: Action): number {
  switch (a.type) {
    case 'ron':
      return 3;
    case 'pon':
    case 'kan':
      return 2;
    case 'chi':
      return 1;
    default:
      return 0;
  }
}
