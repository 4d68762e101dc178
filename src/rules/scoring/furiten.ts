import { findWaitTiles } from '../../domain/HandAnalyzer';
import type { HandSlice } from './context';

/**
 * Ron is barred when a wait sits in the seat's own pond, or a winning tile
 * already went by (since its last discard, or at all after riichi).
 */
export function isFuriten(hand: HandSlice): boolean {
  if (hand.tempFuriten || hand.riichiFuriten) return true;
  const waits = findWaitTiles(hand.tiles, hand.melds);
  return waits.some((w) => hand.discards.includes(w));
}
