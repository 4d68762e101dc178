import type { Seat } from '../game/Player';
import { getRule, withOverrides } from '../rules/RuleRegistry';
import type { HandOutcome, HandParameters } from '../rules/progression';
import { firstHandParameters, isGameOver, nextHandParameters } from '../rules/progression';

function won(winner: Seat): HandOutcome {
  return {
    endType: 'RON',
    winner,
    loser: winner === 0 ? 1 : 0,
    scoreChanges: [0, 0, 0, 0],
    details: null,
    tenpai: null,
    abortiveReason: null,
  };
}

function drawn(tenpai: [boolean, boolean, boolean, boolean]): HandOutcome {
  return {
    endType: 'EXHAUSTIVE_DRAW',
    winner: null,
    loser: null,
    scoreChanges: [0, 0, 0, 0],
    details: null,
    tenpai,
    abortiveReason: null,
  };
}

const east1: HandParameters = { ...firstHandParameters(0), honba: 1, riichiSticks: 2 };

describe('nextHandParameters', () => {
  test('dealer win repeats with one more honba, sticks paid out', () => {
    expect(nextHandParameters(east1, won(0))).toEqual({ ...east1, honba: 2, riichiSticks: 0 });
  });

  test('non-dealer win passes the deal and clears honba', () => {
    expect(nextHandParameters(east1, won(2))).toEqual({
      dealer: 1,
      initialDealer: 0,
      roundWind: 0,
      roundNumber: 2,
      honba: 0,
      riichiSticks: 0,
    });
  });

  test('tenpai dealer keeps the seat at a draw, sticks carry', () => {
    expect(nextHandParameters(east1, drawn([true, false, false, false]))).toEqual({ ...east1, honba: 2 });
  });

  test('noten dealer passes the deal, honba back to zero', () => {
    const next = nextHandParameters(east1, drawn([false, true, false, false]));
    expect(next.dealer).toBe(1);
    expect(next.honba).toBe(0);
    expect(next.riichiSticks).toBe(2);
  });

  test('abortive draws repeat the hand', () => {
    const next = nextHandParameters(east1, { ...drawn([false, false, false, false]), endType: 'ABORTIVE_DRAW', tenpai: null, abortiveReason: 'fourWinds' });
    expect(next.dealer).toBe(0);
    expect(next.honba).toBe(2);
  });

  test('wrapping back to the first dealer advances the round wind', () => {
    const east4: HandParameters = { dealer: 3, initialDealer: 0, roundWind: 0, roundNumber: 4, honba: 0, riichiSticks: 0 };
    expect(nextHandParameters(east4, won(1))).toEqual({
      dealer: 0,
      initialDealer: 0,
      roundWind: 1,
      roundNumber: 1,
      honba: 0,
      riichiSticks: 0,
    });
  });
});

describe('isGameOver', () => {
  const south1: HandParameters = { ...firstHandParameters(0), roundWind: 1 };
  const west1: HandParameters = { ...firstHandParameters(0), roundWind: 2 };
  const scores = [25000, 25000, 25000, 25000];

  test('ends after the configured round wind', () => {
    expect(isGameOver(south1, scores, getRule('hanchan'))).toBe(false);
    expect(isGameOver(west1, scores, getRule('hanchan'))).toBe(true);
    expect(isGameOver(south1, scores, getRule('tonpuusen'))).toBe(true);
    expect(isGameOver(west1, scores, getRule('issousen'))).toBe(false);
  });

  test('a negative score ends the game when bust-out is on', () => {
    const busted = [51000, -1000, 25000, 25000];
    expect(isGameOver(south1, busted, getRule('hanchan'))).toBe(true);
    expect(isGameOver(south1, busted, withOverrides(getRule('hanchan'), { bustOut: false }))).toBe(false);
  });
});

describe('rule registry', () => {
  test('unknown ids fall back to hanchan', () => {
    expect(getRule('no-such-rule').id).toBe('hanchan');
    expect(getRule(' TONPUUSEN ').gameLength).toBe('tonpuusen');
  });
});
