import { parseTile, tileLabel } from '../domain/Tile';
import { makeTileSet } from '../domain/Wall';
import { InvariantViolation } from '../domain/errors';
import { createRng } from '../domain/random';
import { Game } from '../game/Game';
import { SEATS } from '../game/Player';
import { getRule, withOverrides } from '../rules/RuleRegistry';
import { act, discardDrawn, keyed, legalKeys, stackedGame } from './gameHelpers';

// 234m 678m 567s with a 34p ryanmen and a 99s pair
const DEALER_PINFU = '234m678m34p567s99s';

describe('dealer tsumo', () => {
  const wall = {
    hands: { 0: DEALER_PINFU },
    draws: '1z7z6z5z5p',
    deadWall: '2222z3333z4444z11z',
  };

  test('dealer keeps the seat with one more honba', () => {
    const game = stackedGame(wall);
    expect(game.actingSeat).toBe(0);
    expect(game.getPlayer(0).drawn).toEqual(parseTile('1z'));

    discardDrawn(game);
    discardDrawn(game);
    discardDrawn(game);
    discardDrawn(game);

    expect(game.actingSeat).toBe(0);
    expect(legalKeys(game, 0)).toContain('tsumo');
    const r = act(game, 0, 'tsumo');
    if (!r.ok) throw new Error(r.message);

    expect(r.outcome?.endType).toBe('TSUMO');
    expect(r.outcome?.winner).toBe(0);
    expect(r.outcome?.details?.yaku.map((y) => y.name)).toEqual(['menzenTsumo', 'pinfu']);
    expect(r.outcome?.scoreChanges).toEqual([2100, -700, -700, -700]);
    expect(game.scores).toEqual([27100, 24300, 24300, 24300]);

    expect(game.handParameters).toEqual({
      dealer: 0,
      initialDealer: 0,
      roundWind: 0,
      roundNumber: 1,
      honba: 1,
      riichiSticks: 0,
    });
    expect(game.currentPhase).toBe('PLAYER_DISCARD');
    expect(game.handLabel).toBe('East 1, 1 honba');
  });

  test('illegal actions are rejected without touching the state', () => {
    const game = stackedGame(wall);
    const before = game.snapshot();

    expect(game.apply(1, { type: 'pass' })).toEqual({ ok: false, message: 'illegal action pass for seat 1' });
    expect(game.apply(0, { type: 'tsumo' }).ok).toBe(false);
    expect(game.apply(0, { type: 'discard', tile: parseTile('9p') }).ok).toBe(false);

    expect(game.snapshot()).toEqual(before);
  });
});

describe('exhaustive draw', () => {
  test('two tenpai seats take 1500 from each noten seat', () => {
    const game = stackedGame({
      hands: {
        0: DEALER_PINFU,
        1: '13579m2468p1367s',
        2: '456m345p678s2355s',
        3: '2469m2469p2469s7z',
      },
      draws: '1z2z3z4z',
      liveSize: 56,
    });

    discardDrawn(game);
    discardDrawn(game);
    discardDrawn(game);
    const r = discardDrawn(game);
    if (!r.ok) throw new Error(r.message);

    expect(r.outcome?.endType).toBe('EXHAUSTIVE_DRAW');
    expect(r.outcome?.tenpai).toEqual([true, false, true, false]);
    expect(r.outcome?.scoreChanges).toEqual([1500, -1500, 1500, -1500]);
    expect(game.scores).toEqual([26500, 23500, 26500, 23500]);
    expect(game.handParameters.dealer).toBe(0);
    expect(game.handParameters.honba).toBe(1);
  });
});

describe('kan', () => {
  const wall = {
    hands: { 0: '222m456p678s1155z' },
    draws: '2m',
    deadWall: '789m1p1234s',
  };

  test('closed kan flips a dora and draws a replacement', () => {
    const game = stackedGame(wall);
    const r = act(game, 0, 'kan:closed:2m');

    expect(r.ok && r.phase).toBe('PLAYER_DISCARD');
    const dealer = game.getPlayer(0);
    expect(dealer.melds).toHaveLength(1);
    expect(dealer.melds[0]?.type === 'kan' && dealer.melds[0].kind).toBe('closed');
    expect(dealer.drawn && tileLabel(dealer.drawn)).toBe('7m');
    expect(game.getWall().doraIndicators.map(tileLabel)).toEqual(['1s', '3s']);
    expect(game.getWall().doraValues).toEqual([19, 21]);
    expect(game.getWall().replacementCount).toBe(3);
  });

  test('with afterDiscard timing the indicator waits for the discard', () => {
    const game = stackedGame(wall, withOverrides(getRule(null), { kanDoraTiming: 'afterDiscard' }));
    act(game, 0, 'kan:closed:2m');
    expect(game.getWall().doraIndicators).toHaveLength(1);

    act(game, 0, 'discard:7m');
    expect(game.getWall().doraIndicators.map(tileLabel)).toEqual(['1s', '3s']);
  });
});

describe('calls', () => {
  const wall = {
    hands: {
      0: '2468m2468p13789s',
      1: '1469s1357m1357p2z',
      2: '55s2468m2468p347z',
    },
    draws: '5s',
  };

  test('responders declare in turn order and pon beats chi', () => {
    const game = stackedGame(wall);
    act(game, 0, 'discard:5s');

    expect(game.currentPhase).toBe('WAITING_FOR_RESPONSE');
    expect(game.actingSeats()).toEqual([1]);
    expect(legalKeys(game, 1)).toEqual(['chi:4s6s', 'pass']);
    expect(legalKeys(game, 2)).toEqual([]);

    act(game, 1, 'chi:4s6s');
    expect(game.actingSeats()).toEqual([2]);
    expect(legalKeys(game, 2)).toEqual(['pon:5s5s', 'pass']);

    const r = act(game, 2, 'pon:5s5s');
    expect(r.ok && r.phase).toBe('PLAYER_DISCARD');
    expect(game.actingSeat).toBe(2);

    const caller = game.getPlayer(2);
    const meld = caller.melds[0];
    expect(meld?.type).toBe('pon');
    expect(meld?.fromSeat).toBe(0);
    expect(meld?.tiles.map(tileLabel)).toEqual(['5s', '5s', '5s']);
    expect(caller.drawn).toBeNull();
    expect(caller.hand.size).toBe(11);
    expect(game.getPlayer(0).discards[0]?.calledBy).toBe(2);
    expect(game.getPlayer(1).melds).toEqual([]);
    expect(game.legalActions(2).every((a) => a.type === 'discard')).toBe(true);

    // turn passes from the caller, skipping seat 1
    act(game, 2, 'discard:7z');
    expect(game.actingSeat).toBe(3);
    expect(game.getPlayer(3).drawn).not.toBeNull();
  });

  test('chi goes through when the pon seat passes', () => {
    const game = stackedGame(wall);
    act(game, 0, 'discard:5s');
    act(game, 1, 'chi:4s6s');
    act(game, 2, 'pass');

    expect(game.actingSeat).toBe(1);
    const meld = game.getPlayer(1).melds[0];
    expect(meld?.type).toBe('chi');
    expect(meld?.tiles.map(tileLabel)).toEqual(['4s', '5s', '6s']);
    expect(game.getPlayer(2).melds).toEqual([]);
  });

  test('ron beats pon and ends the hand', () => {
    const game = stackedGame({
      hands: {
        0: '2468m2468p13579s',
        1: '44m1367p1469s234z',
        2: '23m456p789s234s55p',
        3: '5555z6666z7777z1z',
      },
      draws: '4m',
      deadWall: '111z222z',
    });
    act(game, 0, 'discard:4m');
    expect(game.actingSeats()).toEqual([1]);
    expect(legalKeys(game, 1)).toEqual(['pon:4m4m', 'pass']);

    act(game, 1, 'pon:4m4m');
    expect(legalKeys(game, 2)).toEqual(['ron', 'pass']);
    const r = act(game, 2, 'ron');
    if (!r.ok) throw new Error(r.message);

    expect(r.outcome?.endType).toBe('RON');
    expect(r.outcome?.winner).toBe(2);
    expect(r.outcome?.loser).toBe(0);
    expect(r.outcome?.details?.yaku).toEqual([{ name: 'pinfu', han: 1 }]);
    expect(r.outcome?.scoreChanges).toEqual([-1000, 0, 1000, 0]);
    expect(game.handParameters.dealer).toBe(1);
    expect(game.handParameters.honba).toBe(0);
    expect(game.handLabel).toBe('East 2, 0 honba');
  });
});

// Dealer waits on 1-4m after throwing the 9p it draws; nobody else can call 9p, 1m or 4m.
const RIICHI_TABLE = {
  hands: {
    0: '23m456p789s234s55p',
    1: '4679m1368s3z4z5z6z7z',
    2: '4578m1247p5s3z4z5z6z',
    3: '3689m2368p6s3z4z5z6z',
  },
  draws: '9p1m4m7z9m',
  deadWall: '1111z2222z',
} as const;

describe('riichi', () => {
  test('declaring pays a stick and ron on the next discard scores ippatsu', () => {
    const game = stackedGame(RIICHI_TABLE);
    act(game, 0, 'riichi:9p');

    const dealer = game.getPlayer(0);
    expect(dealer.score).toBe(24000);
    expect(game.handParameters.riichiSticks).toBe(1);
    expect([dealer.riichi, dealer.doubleRiichi, dealer.ippatsu]).toEqual([true, true, true]);
    const seat = game.snapshot().seats[0];
    expect(seat?.riichiDiscardIndex).toBe(0);
    expect(seat?.discards[0]?.riichi).toBe(true);
    expect(game.actingSeat).toBe(1);

    act(game, 1, 'discard:1m');
    expect(game.actingSeats()).toEqual([0]);
    expect(legalKeys(game, 0)).toEqual(['ron', 'pass']);

    const r = act(game, 0, 'ron');
    if (!r.ok) throw new Error(r.message);
    expect(r.outcome?.details?.yaku).toEqual([
      { name: 'doubleRiichi', han: 2 },
      { name: 'ippatsu', han: 1 },
      { name: 'pinfu', han: 1 },
    ]);
    expect(r.outcome?.scoreChanges).toEqual([12600, -11600, 0, 0]);
    expect(game.scores).toEqual([36600, 13400, 25000, 25000]);
    expect(game.handParameters.riichiSticks).toBe(0);
    expect(game.handParameters.honba).toBe(1);
  });

  test('a passed winning tile leaves the riichi seat furiten for the hand', () => {
    const game = stackedGame(RIICHI_TABLE);
    act(game, 0, 'riichi:9p');
    act(game, 1, 'discard:1m');
    act(game, 0, 'pass');

    const dealer = game.getPlayer(0);
    expect(dealer.tempFuriten).toBe(true);
    expect(dealer.riichiFuriten).toBe(true);

    // the other half of the wait goes by without a window
    act(game, 2, 'discard:4m');
    expect(game.currentPhase).toBe('PLAYER_DISCARD');
    expect(game.actingSeat).toBe(3);

    act(game, 3, 'discard:7z');
    expect(dealer.ippatsu).toBe(true);
    expect(legalKeys(game, 0)).toEqual(['discard:9m']);

    act(game, 0, 'discard:9m');
    expect(dealer.ippatsu).toBe(false);
    expect(dealer.tempFuriten).toBe(false);
    expect(dealer.riichiFuriten).toBe(true);
  });

  test('a bust ends the game', () => {
    const game = stackedGame(RIICHI_TABLE, withOverrides(getRule(null), { startingScore: 1000 }));
    act(game, 0, 'riichi:9p');
    act(game, 1, 'discard:1m');
    act(game, 0, 'ron');

    expect(game.scores).toEqual([12600, -10600, 1000, 1000]);
    expect(game.currentPhase).toBe('GAME_OVER');
    expect(game.isGameOver).toBe(true);
    expect(game.resetNewHand()).toEqual({ ok: false, message: 'game is over' });
  });
});

describe('chankan', () => {
  // seat 1 pons the dealer's 3s and later draws the fourth; seat 2 ends up on a 24s kanchan
  const wall = {
    hands: {
      0: '1368m1349p1578s4z',
      1: '33s147m258p69s5z6z7z',
      2: '24s345m678p789p9m1z',
      3: '2679m2356p2678s4z',
    },
    draws: '3s9m2z3z3s',
    deadWall: '111m9s5z',
  };

  function toAddedKan() {
    const game = stackedGame(wall);
    act(game, 0, 'discard:3s');
    act(game, 1, 'pon:3s3s');
    act(game, 1, 'discard:6z');
    act(game, 2, 'discard:1z');
    act(game, 3, 'discard:2z');
    act(game, 0, 'discard:3z');
    act(game, 1, 'kan:added:3s');
    return game;
  }

  test('an added kan can be robbed', () => {
    const game = toAddedKan();
    expect(game.currentPhase).toBe('WAITING_FOR_RESPONSE');
    expect(game.actingSeats()).toEqual([2]);
    expect(legalKeys(game, 2)).toEqual(['ron', 'pass']);

    const r = act(game, 2, 'ron');
    if (!r.ok) throw new Error(r.message);
    expect(r.outcome?.endType).toBe('RON');
    expect(r.outcome?.loser).toBe(1);
    expect(r.outcome?.details?.yaku).toEqual([{ name: 'chankan', han: 1 }]);
    expect(r.outcome?.details?.fu).toBe(40);
    expect(r.outcome?.scoreChanges).toEqual([0, -1300, 1300, 0]);
  });

  test('a passed chankan completes the kan and leaves the passer furiten', () => {
    const game = toAddedKan();
    act(game, 2, 'pass');

    const kanSeat = game.getPlayer(1);
    expect(game.actingSeat).toBe(1);
    expect(kanSeat.melds[0]?.type === 'kan' && kanSeat.melds[0].kind).toBe('added');
    expect(kanSeat.drawn && tileLabel(kanSeat.drawn)).toBe('1m');
    expect(game.getWall().doraIndicators).toHaveLength(2);
    expect(game.getPlayer(2).tempFuriten).toBe(true);
  });
});

describe('abortive draws', () => {
  test('four riichi declarations', () => {
    const game = stackedGame({
      hands: {
        0: '123m456m789m123p9p',
        1: '123s456s789s456p1p',
        2: '234m567p234s678s5z',
        3: '345m678p345s666z7z',
      },
      draws: '1z2z3z4z',
    });
    act(game, 0, 'riichi:1z');
    act(game, 1, 'riichi:2z');
    act(game, 2, 'riichi:3z');
    const r = act(game, 3, 'riichi:4z');
    if (!r.ok) throw new Error(r.message);

    expect(r.outcome?.endType).toBe('ABORTIVE_DRAW');
    expect(r.outcome?.abortiveReason).toBe('fourRiichi');
    expect(game.scores).toEqual([24000, 24000, 24000, 24000]);
    expect(game.handParameters).toEqual({
      dealer: 0,
      initialDealer: 0,
      roundWind: 0,
      roundNumber: 1,
      honba: 1,
      riichiSticks: 4,
    });
  });

  test('four identical winds in the first go-around', () => {
    const game = stackedGame({ hands: RIICHI_TABLE.hands, draws: '1z1z1z1z' });
    act(game, 0, 'discard:1z');
    act(game, 1, 'discard:1z');
    act(game, 2, 'discard:1z');
    const r = act(game, 3, 'discard:1z');
    if (!r.ok) throw new Error(r.message);

    expect(r.outcome?.abortiveReason).toBe('fourWinds');
    expect(r.outcome?.scoreChanges).toEqual([0, 0, 0, 0]);
    expect(game.handParameters.honba).toBe(1);
  });

  test('nine terminals on the first draw', () => {
    const game = stackedGame({ hands: { ...RIICHI_TABLE.hands, 0: '19m19p19s1234z456m' }, draws: '7p' });
    expect(legalKeys(game, 0)).toContain('abortiveDraw');
    const r = act(game, 0, 'abortiveDraw');
    if (!r.ok) throw new Error(r.message);

    expect(r.outcome?.abortiveReason).toBe('nineTerminals');
    expect(game.handParameters.dealer).toBe(0);
    expect(game.handParameters.honba).toBe(1);
  });

  test('a fifth kan finds no replacement tile', () => {
    const game = stackedGame({
      hands: { 0: '1111m2222m3333m4m', 1: '666p1379s1z2z3z4z6z7z' },
      draws: '4m6p',
      deadWall: '44m55z',
    });
    act(game, 0, 'kan:closed:1m');
    act(game, 0, 'kan:closed:2m');
    act(game, 0, 'kan:closed:3m');
    act(game, 0, 'kan:closed:4m');
    expect(game.getWall().replacementCount).toBe(0);
    act(game, 0, 'discard:5z');

    expect(legalKeys(game, 1)).toContain('kan:closed:6p');
    const r = act(game, 1, 'kan:closed:6p');
    if (!r.ok) throw new Error(r.message);
    expect(r.outcome?.abortiveReason).toBe('replacementExhausted');
    expect(game.handParameters.honba).toBe(1);
  });

  test('a wall too short to deal', () => {
    const game = new Game(getRule(null));
    game.stackNextWall(makeTileSet([1, 1, 1]).slice(0, 40));
    game.resetGame(1);

    expect(game.handOutcome()?.abortiveReason).toBe('dealUnderflow');
    expect(game.handParameters.honba).toBe(1);
    expect(game.currentPhase).toBe('PLAYER_DISCARD');
  });
});

describe('invariant violations', () => {
  test('fault the game and reject later actions', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const game = stackedGame({ hands: { 0: DEALER_PINFU }, draws: '1z' });
    const discard = keyed(game, 0, 'discard:1z');
    game.getPlayer(1).hand.add(parseTile('9m'));

    expect(() => game.apply(0, discard)).toThrow(InvariantViolation);
    expect(error).toHaveBeenCalledWith('[riichi-table] invariant violation:', 'tile count 137 != 136');
    expect(game.isFaulted).toBe(true);
    expect(game.legalActions(1)).toEqual([]);
    expect(game.apply(1, { type: 'pass' })).toEqual({ ok: false, message: 'game is faulted after an internal error' });
    expect(game.resetNewHand()).toEqual({ ok: false, message: 'game is faulted' });
    error.mockRestore();
  });
});

describe('seeded play', () => {
  function play(seed: number, steps: number): Game {
    const game = new Game(getRule(null));
    game.resetGame(seed);
    const rng = createRng(seed * 7 + 1);
    for (let i = 0; i < steps; i++) {
      const [seat] = game.actingSeats();
      if (seat === undefined) break;
      const legal = game.legalActions(seat);
      expect(legal.length).toBeGreaterThan(0);
      const action = legal[Math.floor(rng() * legal.length)];
      if (!action) throw new Error('no action picked');
      expect(game.apply(seat, action).ok).toBe(true);

      const held = SEATS.reduce<number>((a, s) => a + game.getPlayer(s).tileCount, 0);
      expect(held + game.getWall().remaining).toBe(136);
    }
    return game;
  }

  test.each([1, 2, 3, 4])('random legal play keeps all 136 tiles (seed %i)', (seed) => {
    const game = play(seed, 1500);
    expect(game.isFaulted).toBe(false);
  });

  test('same seed and choices give the same game', () => {
    expect(play(9, 300).snapshot()).toEqual(play(9, 300).snapshot());
  });
});
