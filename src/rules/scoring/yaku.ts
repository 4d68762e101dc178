import type { Tile, TileValue } from '../../domain/Tile';
import { GREEN, RED, WHITE, isDragon, isHonor, isSimple, isTerminalOrHonor, rankOfIndex, suitOfIndex } from '../../domain/Tile';
import type { SetBlock, WinReading } from '../../domain/HandAnalyzer';
import type { WinContext, Yaku } from './context';
import { isTsumo } from './context';

export type YakuInput = {
  /** Every tile of the winning hand, kans counted with all four. */
  allTiles: readonly Tile[];
  menzen: boolean;
  ctx: WinContext;
};

const isTripletLike = (s: SetBlock) => s.kind === 'triplet' || s.kind === 'quad';

/** Pair value scores as yakuhai: dragons, seat wind, round wind. */
export function yakuhaiRoles(v: TileValue, ctx: WinContext): number {
  let roles = 0;
  if (isDragon(v)) roles++;
  if (v === ctx.seatWind) roles++;
  if (v === ctx.roundWind) roles++;
  return roles;
}

function setHasTerminalOrHonor(s: SetBlock): boolean {
  if (s.kind !== 'run') return isTerminalOrHonor(s.value);
  const r = rankOfIndex(s.value);
  return r === 1 || r === 7;
}

function setHasHonor(s: SetBlock): boolean {
  return s.kind !== 'run' && isHonor(s.value);
}

function suitsOf(tiles: readonly Tile[]): Set<string> {
  const suits = new Set<string>();
  for (const t of tiles) {
    const s = suitOfIndex(t.value);
    if (s !== 'z') suits.add(s);
  }
  return suits;
}

/** Yaku that come from how the hand was won, not its shape. */
export function situationalYaku(input: YakuInput): Yaku[] {
  const { ctx, menzen } = input;
  const out: Yaku[] = [];
  if (ctx.doubleRiichi) out.push({ name: 'doubleRiichi', han: 2 });
  else if (ctx.riichi) out.push({ name: 'riichi', han: 1 });
  if ((ctx.riichi || ctx.doubleRiichi) && ctx.ippatsu) out.push({ name: 'ippatsu', han: 1 });
  if (isTsumo(ctx) && menzen) out.push({ name: 'menzenTsumo', han: 1 });
  if (ctx.haitei) out.push({ name: 'haitei', han: 1 });
  if (ctx.houtei) out.push({ name: 'houtei', han: 1 });
  if (ctx.rinshan) out.push({ name: 'rinshan', han: 1 });
  if (ctx.chankan) out.push({ name: 'chankan', han: 1 });
  return out;
}

/** Yaku shared by every shape: tanyao, honroutou, flushes. */
function tileYaku(input: YakuInput, hasRun: boolean): Yaku[] {
  const { allTiles, menzen, ctx } = input;
  const out: Yaku[] = [];

  if (allTiles.every((t) => isSimple(t.value)) && (menzen || ctx.openTanyao)) out.push({ name: 'tanyao', han: 1 });

  if (!hasRun && allTiles.every((t) => isTerminalOrHonor(t.value))) out.push({ name: 'honroutou', han: 2 });

  const suits = suitsOf(allTiles);
  if (suits.size === 1) {
    if (allTiles.some((t) => isHonor(t.value))) out.push({ name: 'honitsu', han: menzen ? 3 : 2 });
    else out.push({ name: 'chinitsu', han: menzen ? 6 : 5 });
  }
  return out;
}

export function sevenPairsYaku(input: YakuInput): Yaku[] {
  return [...situationalYaku(input), { name: 'chiitoitsu', han: 2 }, ...tileYaku(input, false)];
}

export function isPinfu(reading: WinReading, input: YakuInput): boolean {
  const { form, wait } = reading;
  return (
    input.menzen &&
    form.sets.every((s) => s.kind === 'run') &&
    yakuhaiRoles(form.pair, input.ctx) === 0 &&
    wait === 'ryanmen'
  );
}

export function standardYaku(reading: WinReading, input: YakuInput): Yaku[] {
  const { form } = reading;
  const { menzen, ctx } = input;
  const sets = form.sets;
  const out: Yaku[] = [...situationalYaku(input)];

  for (const s of sets) {
    if (!isTripletLike(s)) continue;
    if (s.value === WHITE) out.push({ name: 'haku', han: 1 });
    if (s.value === GREEN) out.push({ name: 'hatsu', han: 1 });
    if (s.value === RED) out.push({ name: 'chun', han: 1 });
    if (s.value === ctx.seatWind) out.push({ name: 'seatWind', han: 1 });
    if (s.value === ctx.roundWind) out.push({ name: 'roundWind', han: 1 });
  }

  if (isPinfu(reading, input)) out.push({ name: 'pinfu', han: 1 });

  const runs = sets.filter((s) => s.kind === 'run');
  if (menzen) {
    const byStart = new Map<number, number>();
    for (const r of runs) byStart.set(r.value, (byStart.get(r.value) ?? 0) + 1);
    let identical = 0;
    for (const n of byStart.values()) identical += Math.floor(n / 2);
    if (identical >= 2) out.push({ name: 'ryanpeikou', han: 3 });
    else if (identical === 1) out.push({ name: 'iipeikou', han: 1 });
  }

  const hasRun = (v: number) => runs.some((r) => r.value === v);
  for (let rank = 0; rank < 7; rank++) {
    if (hasRun(rank) && hasRun(rank + 9) && hasRun(rank + 18)) {
      out.push({ name: 'sanshoku', han: menzen ? 2 : 1 });
      break;
    }
  }
  for (const base of [0, 9, 18]) {
    if (hasRun(base) && hasRun(base + 3) && hasRun(base + 6)) {
      out.push({ name: 'ittsuu', han: menzen ? 2 : 1 });
      break;
    }
  }

  const allOutside = sets.every(setHasTerminalOrHonor) && isTerminalOrHonor(form.pair);
  if (allOutside && runs.length > 0) {
    const honors = sets.some(setHasHonor) || isHonor(form.pair);
    if (honors) out.push({ name: 'chanta', han: menzen ? 2 : 1 });
    else out.push({ name: 'junchan', han: menzen ? 3 : 2 });
  }

  const triplets = sets.filter(isTripletLike);
  if (triplets.length === 4) out.push({ name: 'toitoi', han: 2 });
  if (triplets.filter((s) => !s.open).length >= 3) out.push({ name: 'sanankou', han: 2 });

  const hasTriplet = (v: number) => triplets.some((s) => s.value === v);
  for (let rank = 0; rank < 9; rank++) {
    if (hasTriplet(rank) && hasTriplet(rank + 9) && hasTriplet(rank + 18)) {
      out.push({ name: 'sanshokuDoukou', han: 2 });
      break;
    }
  }

  if (sets.filter((s) => s.kind === 'quad').length === 3) out.push({ name: 'sankantsu', han: 2 });

  const dragonTriplets = triplets.filter((s) => isDragon(s.value)).length;
  if (dragonTriplets === 2 && isDragon(form.pair)) out.push({ name: 'shousangen', han: 2 });

  out.push(...tileYaku(input, runs.length > 0));
  return out;
}
