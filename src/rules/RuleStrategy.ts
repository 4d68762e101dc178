import type { RedFives } from '../domain/Wall';

export type GameLength = 'tonpuusen' | 'hanchan' | 'issousen';

/** When a kan's new dora indicator is flipped. */
export type KanDoraTiming = 'immediate' | 'afterDiscard';

/**
 * Table rules. Registered as presets in RuleRegistry; rooms pick one by id.
 */
export interface RuleSet {
  /** Stable id used for config/room selection. */
  readonly id: string;
  /** Display name (for UI / debugging). */
  readonly name: string;

  readonly gameLength: GameLength;
  readonly startingScore: number;
  /** Red fives per suit (man, pin, sou). */
  readonly redFives: RedFives;
  /** Tanyao counts for open hands (kuitan). */
  readonly openTanyao: boolean;
  readonly kanDoraTiming: KanDoraTiming;
  /** Nine terminals, four riichi, four winds. */
  readonly abortiveDraws: boolean;
  /** The game ends as soon as a score drops below zero. */
  readonly bustOut: boolean;
  /** Deal the next hand right after scoring instead of waiting for resetNewHand(). */
  readonly autoNextHand: boolean;
}

/** Index of the last round wind a game of this length plays (0 = east). */
export function lastRoundWind(length: GameLength): number {
  switch (length) {
    case 'tonpuusen':
      return 0;
    case 'hanchan':
      return 1;
    case 'issousen':
      return 3;
  }
}
