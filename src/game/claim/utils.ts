import type { Seat } from '../Player';
import { seatAfter } from '../Player';

/** Seats other than `from`, in turn order after it. */
export function turnOrderAfter(from: Seat): Seat[] {
  return [seatAfter(from, 1), seatAfter(from, 2), seatAfter(from, 3)];
}

/** Tie-break order among equal claims: discarder-1, -2, -3. */
export function priorityScanOrder(discarder: Seat): Seat[] {
  return [seatAfter(discarder, -1), seatAfter(discarder, -2), seatAfter(discarder, -3)];
}
