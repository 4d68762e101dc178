import type { Action } from '../Action';
import { claimPriority } from '../Action';
import type { Seat } from '../Player';
import type { ClaimResolution } from './types';
import { priorityScanOrder } from './utils';

/**
 * Picks the winning claim: ron beats pon/kan beats chi; within the best class
 * the first declarant in priorityScanOrder wins. Null when everyone passed.
 *
 * Pure: reads the declarations only. Game applies the result.
 */
export function resolveDeclarations(declarations: ReadonlyMap<Seat, Action>, discarder: Seat): ClaimResolution {
  let best = 0;
  for (const a of declarations.values()) best = Math.max(best, claimPriority(a));
  if (best === 0) return null;

  for (const seat of priorityScanOrder(discarder)) {
    const action = declarations.get(seat);
    if (action && claimPriority(action) === best) return { action, seat };
  }
  return null;
}
