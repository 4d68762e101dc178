import type { Seat } from '../game/Player';
import { seatAfter } from '../game/Player';
import type { RuleSet } from './RuleStrategy';
import { lastRoundWind } from './RuleStrategy';
import type { WinDetails } from './scoring/context';

export type EndType = 'TSUMO' | 'RON' | 'EXHAUSTIVE_DRAW' | 'ABORTIVE_DRAW';

export type AbortiveReason = 'nineTerminals' | 'fourRiichi' | 'fourWinds' | 'replacementExhausted' | 'dealUnderflow';

export type ScoreTuple = [number, number, number, number];

export type HandOutcome = {
  endType: EndType;
  winner: Seat | null;
  /** Discarder on ron. */
  loser: Seat | null;
  scoreChanges: ScoreTuple;
  details: WinDetails | null;
  /** Tenpai flags at an exhaustive draw. */
  tenpai: [boolean, boolean, boolean, boolean] | null;
  abortiveReason: AbortiveReason | null;
};

export type HandParameters = {
  dealer: Seat;
  initialDealer: Seat;
  /** 0 east, 1 south, 2 west, 3 north. */
  roundWind: number;
  /** 1..4 within the round wind. */
  roundNumber: number;
  honba: number;
  riichiSticks: number;
};

export function firstHandParameters(initialDealer: Seat = 0): HandParameters {
  return { dealer: initialDealer, initialDealer, roundWind: 0, roundNumber: 1, honba: 0, riichiSticks: 0 };
}

export function dealerKeepsSeat(params: HandParameters, outcome: HandOutcome): boolean {
  switch (outcome.endType) {
    case 'TSUMO':
    case 'RON':
      return outcome.winner === params.dealer;
    case 'EXHAUSTIVE_DRAW':
      return outcome.tenpai?.[params.dealer] ?? false;
    case 'ABORTIVE_DRAW':
      return true;
  }
}

/**
 * Dealer, round and counters for the hand after `outcome`.
 * `params.riichiSticks` is the pool as it stood at hand end.
 */
export function nextHandParameters(params: HandParameters, outcome: HandOutcome): HandParameters {
  const won = outcome.winner !== null;
  const riichiSticks = won ? 0 : params.riichiSticks;

  if (dealerKeepsSeat(params, outcome)) {
    return { ...params, honba: params.honba + 1, riichiSticks };
  }

  const dealer = seatAfter(params.dealer);
  const wrapped = dealer === params.initialDealer;
  return {
    dealer,
    initialDealer: params.initialDealer,
    roundWind: wrapped ? params.roundWind + 1 : params.roundWind,
    roundNumber: wrapped ? 1 : params.roundNumber + 1,
    honba: 0,
    riichiSticks,
  };
}

/** Someone busted, or the next hand would fall past the configured length. */
export function isGameOver(next: HandParameters, scores: readonly number[], rules: RuleSet): boolean {
  if (rules.bustOut && scores.some((s) => s < 0)) return true;
  return next.roundWind > lastRoundWind(rules.gameLength);
}
