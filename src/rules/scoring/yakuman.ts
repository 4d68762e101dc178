import type { Tile } from '../../domain/Tile';
import { GREEN, countValues, isDragon, isHonor, isTerminal, isWind, suitOfIndex } from '../../domain/Tile';
import type { WinForm, WinReading } from '../../domain/HandAnalyzer';
import type { Meld } from '../../domain/Meld';
import type { WinContext, Yaku } from './context';
import { isTsumo } from './context';

// 2-3-4-6-8 sou and the green dragon
const GREEN_VALUES = new Set([19, 20, 21, 23, 25, GREEN]);

function isNineGates(concealed: readonly Tile[], melds: readonly Meld[]): boolean {
  if (melds.length > 0 || concealed.length !== 14) return false;
  const first = concealed[0];
  if (!first || isHonor(first.value)) return false;
  const suit = suitOfIndex(first.value);
  if (concealed.some((t) => suitOfIndex(t.value) !== suit)) return false;
  const counts = countValues(concealed);
  const base = first.value - (first.value % 9);
  for (let r = 0; r < 9; r++) {
    const need = r === 0 || r === 8 ? 3 : 1;
    if ((counts[base + r] ?? 0) < need) return false;
  }
  return true;
}

/** Yakuman that do not depend on a decomposition. */
function tileYakuman(allTiles: readonly Tile[], concealed: readonly Tile[], melds: readonly Meld[], ctx: WinContext): Yaku[] {
  const out: Yaku[] = [];
  if (allTiles.every((t) => isHonor(t.value))) out.push({ name: 'tsuuiisou', han: 13 });
  if (allTiles.every((t) => isTerminal(t.value))) out.push({ name: 'chinroutou', han: 13 });
  if (allTiles.every((t) => GREEN_VALUES.has(t.value))) out.push({ name: 'ryuuiisou', han: 13 });
  if (isNineGates(concealed, melds)) out.push({ name: 'chuurenpoutou', han: 13 });
  if (ctx.firstDraw && isTsumo(ctx) && melds.length === 0) {
    out.push({ name: ctx.winner === ctx.dealerSeat ? 'tenhou' : 'chiihou', han: 13 });
  }
  return out;
}

function readingYakuman(reading: WinReading, tsumo: boolean): Yaku[] {
  const { sets, pair } = reading.form;
  const out: Yaku[] = [];
  const triplets = sets.filter((s) => s.kind === 'triplet' || s.kind === 'quad');

  const concealedTriplets = triplets.filter((s) => !s.open).length;
  if (concealedTriplets === 4 && (tsumo || reading.wait === 'tanki')) out.push({ name: 'suuankou', han: 13 });

  if (triplets.filter((s) => isDragon(s.value)).length === 3) out.push({ name: 'daisangen', han: 13 });

  const windTriplets = triplets.filter((s) => isWind(s.value)).length;
  if (windTriplets === 4) out.push({ name: 'daisuushii', han: 13 });
  else if (windTriplets === 3 && isWind(pair)) out.push({ name: 'shousuushii', han: 13 });

  if (sets.filter((s) => s.kind === 'quad').length === 4) out.push({ name: 'suukantsu', han: 13 });
  return out;
}

/**
 * Best yakuman list over every form and reading; empty when the hand has none.
 * `concealed` includes the winning tile.
 */
export function findYakuman(
  forms: readonly WinForm[],
  readingsByForm: ReadonlyMap<WinForm, WinReading[]>,
  allTiles: readonly Tile[],
  concealed: readonly Tile[],
  melds: readonly Meld[],
  ctx: WinContext,
): Yaku[] {
  const common = tileYakuman(allTiles, concealed, melds, ctx);
  let best: Yaku[] = [];
  for (const form of forms) {
    let found: Yaku[] = [];
    if (form.kind === 'thirteenOrphans') {
      found = [{ name: 'kokushi', han: 13 }];
    } else if (form.kind === 'standard') {
      for (const r of readingsByForm.get(form) ?? []) {
        const y = readingYakuman(r, isTsumo(ctx));
        if (y.length > found.length) found = y;
      }
    }
    const total = [...found, ...common];
    if (total.length > best.length) best = total;
  }
  return best;
}
