import type { Tile } from '../../domain/Tile';
import type { Action } from '../Action';
import type { Seat } from '../Player';

/**
 * The window after a discard (or an added kan) where other seats may call.
 *
 * Only seats with at least one non-pass option are queued. They declare in
 * queue order; resolution runs once the queue is empty.
 */
export type ResponseWindow = {
  kind: 'discard' | 'chankan';
  tile: Tile;
  fromSeat: Seat;
  /** Seats still to declare, in turn order after fromSeat. */
  pending: Seat[];
  /** Legal options of each queued seat, fixed when the window opened. */
  options: Map<Seat, Action[]>;
  declarations: Map<Seat, Action>;
};

export type ClaimResolution = { action: Action; seat: Seat } | null;
