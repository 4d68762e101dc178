import type { Tile } from '../../domain/Tile';
import type { WinForm, WinReading, WaitShape } from '../../domain/HandAnalyzer';
import { decompose, readings } from '../../domain/HandAnalyzer';
import { isOpenMeld } from '../../domain/Meld';
import type { HandSlice, WinContext, WinDetails, Yaku } from './context';
import { invalidWin, isTsumo } from './context';
import { SEVEN_PAIRS_FU, standardFu } from './fu';
import { isFuriten } from './furiten';
import { basePoints, payments } from './points';
import { isPinfu, sevenPairsYaku, standardYaku, type YakuInput } from './yaku';
import { findYakuman } from './yakuman';

type Candidate = { yaku: Yaku[]; fu: number; wait: WaitShape | null };

function countDora(tiles: readonly Tile[], values: readonly number[]): number {
  let n = 0;
  for (const v of values) n += tiles.filter((t) => t.value === v).length;
  return n;
}

const hanOf = (yaku: readonly Yaku[]) => yaku.reduce((a, y) => a + y.han, 0);

function better(a: Candidate, b: Candidate | null): boolean {
  if (!b) return true;
  const ha = hanOf(a.yaku);
  const hb = hanOf(b.yaku);
  if (ha !== hb) return ha > hb;
  return a.fu > b.fu;
}

/**
 * Scores `winningTile` completing `hand`. Furiten ron, shapes that do not
 * win and hands without a yaku come back with isValid false.
 */
export function calculateWinDetails(hand: HandSlice, winningTile: Tile, ctx: WinContext): WinDetails {
  const tsumo = isTsumo(ctx);
  if (!tsumo && isFuriten(hand)) return invalidWin('furiten');

  const concealed = [...hand.tiles, winningTile];
  const forms = decompose(concealed, hand.melds);
  if (forms.length === 0) return invalidWin('not a winning shape');

  const allTiles = [...concealed, ...hand.melds.flatMap((m) => m.tiles)];
  const menzen = !hand.melds.some(isOpenMeld);
  const input: YakuInput = { allTiles, menzen, ctx };

  const readingsByForm = new Map<WinForm, WinReading[]>();
  for (const f of forms) {
    if (f.kind === 'standard') readingsByForm.set(f, readings(f, winningTile.value, tsumo));
  }

  const akaDora = allTiles.filter((t) => t.red).length;
  const dora = countDora(allTiles, ctx.doraValues);
  const uraDora = ctx.riichi || ctx.doubleRiichi ? countDora(allTiles, ctx.uraValues) : 0;

  const yakumanList = findYakuman(forms, readingsByForm, allTiles, concealed, hand.melds, ctx);
  if (yakumanList.length > 0) {
    const { base, limit } = basePoints(0, 0, yakumanList.length);
    const pays = payments(base, ctx);
    return {
      isValid: true,
      yaku: yakumanList,
      han: 13 * yakumanList.length,
      fu: 0,
      dora,
      akaDora,
      uraDora,
      yakuman: yakumanList.length,
      limit,
      basePoints: base,
      points: pays.reduce((a, p) => a + p.amount, 0),
      payments: pays,
      stickBonus: 1000 * ctx.riichiSticks,
      wait: null,
    };
  }

  let best: Candidate | null = null;
  for (const f of forms) {
    if (f.kind === 'sevenPairs') {
      const c: Candidate = { yaku: sevenPairsYaku(input), fu: SEVEN_PAIRS_FU, wait: 'tanki' };
      if (better(c, best)) best = c;
      continue;
    }
    if (f.kind !== 'standard') continue;
    for (const r of readingsByForm.get(f) ?? []) {
      const pinfu = isPinfu(r, input);
      const c: Candidate = { yaku: standardYaku(r, input), fu: standardFu(r, { menzen, pinfu, ctx }), wait: r.wait };
      if (better(c, best)) best = c;
    }
  }

  if (!best || best.yaku.length === 0) return invalidWin('no yaku');

  const yakuHan = hanOf(best.yaku);
  const han = yakuHan + dora + akaDora + uraDora;
  const { base, limit } = basePoints(han, best.fu, 0);
  const pays = payments(base, ctx);

  return {
    isValid: true,
    yaku: best.yaku,
    han,
    fu: best.fu,
    dora,
    akaDora,
    uraDora,
    yakuman: 0,
    limit,
    basePoints: base,
    points: pays.reduce((a, p) => a + p.amount, 0),
    payments: pays,
    stickBonus: 1000 * ctx.riichiSticks,
    wait: best.wait,
  };
}

/** Shape, yaku and furiten check only; what the validator offers as tsumo/ron. */
export function isValidWin(hand: HandSlice, winningTile: Tile, ctx: WinContext): boolean {
  return calculateWinDetails(hand, winningTile, ctx).isValid;
}
