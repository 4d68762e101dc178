import type { Tile, TileValue } from './Tile';
import { TERMINAL_HONOR_VALUES, TILE_KINDS, countValues, rankOfIndex, suitOfIndex } from './Tile';
import type { Meld } from './Meld';
import { isOpenMeld, meldValue } from './Meld';

export type SetBlock = {
  kind: 'run' | 'triplet' | 'quad';
  /** Run start, or the repeated value. */
  value: TileValue;
  open: boolean;
  /** Declared meld (chi/pon/kan) rather than a concealed group. */
  called: boolean;
};

export type StandardForm = { kind: 'standard'; sets: SetBlock[]; pair: TileValue };
export type SevenPairsForm = { kind: 'sevenPairs'; pairs: TileValue[] };
export type ThirteenOrphansForm = { kind: 'thirteenOrphans'; pair: TileValue };

export type WinForm = StandardForm | SevenPairsForm | ThirteenOrphansForm;

export type WaitShape = 'ryanmen' | 'kanchan' | 'penchan' | 'shanpon' | 'tanki';

/**
 * One way to read a standard form: which concealed group the winning tile
 * completed. For ron a concealed triplet completed by the discard counts as open.
 */
export type WinReading = {
  form: StandardForm;
  wait: WaitShape;
  /** Index into form.sets, or -1 when the pair was completed. */
  completed: number;
};

function meldToSet(m: Meld): SetBlock {
  const open = isOpenMeld(m);
  if (m.type === 'chi') return { kind: 'run', value: meldValue(m), open, called: true };
  if (m.type === 'pon') return { kind: 'triplet', value: meldValue(m), open, called: true };
  return { kind: 'quad', value: meldValue(m), open, called: true };
}

function firstNonZero(counts: number[]): number {
  for (let i = 0; i < TILE_KINDS; i++) {
    if ((counts[i] ?? 0) > 0) return i;
  }
  return -1;
}

// Every partition of `counts` into triplets and runs. Consumes the smallest
// value first, so each partition comes out once.
function partitions(counts: number[], acc: SetBlock[], out: SetBlock[][]): void {
  const i = firstNonZero(counts);
  if (i === -1) {
    out.push(acc.slice());
    return;
  }

  if ((counts[i] ?? 0) >= 3) {
    counts[i] = (counts[i] ?? 0) - 3;
    acc.push({ kind: 'triplet', value: i, open: false, called: false });
    partitions(counts, acc, out);
    acc.pop();
    counts[i] = (counts[i] ?? 0) + 3;
  }

  if (suitOfIndex(i) !== 'z' && rankOfIndex(i) <= 7 && (counts[i + 1] ?? 0) > 0 && (counts[i + 2] ?? 0) > 0) {
    counts[i] = (counts[i] ?? 0) - 1;
    counts[i + 1] = (counts[i + 1] ?? 0) - 1;
    counts[i + 2] = (counts[i + 2] ?? 0) - 1;
    acc.push({ kind: 'run', value: i, open: false, called: false });
    partitions(counts, acc, out);
    acc.pop();
    counts[i] = (counts[i] ?? 0) + 1;
    counts[i + 1] = (counts[i + 1] ?? 0) + 1;
    counts[i + 2] = (counts[i + 2] ?? 0) + 1;
  }
}

function sevenPairs(counts: number[]): SevenPairsForm | null {
  const pairs: TileValue[] = [];
  for (let i = 0; i < TILE_KINDS; i++) {
    const c = counts[i] ?? 0;
    if (c === 0) continue;
    if (c !== 2) return null;
    pairs.push(i);
  }
  return pairs.length === 7 ? { kind: 'sevenPairs', pairs } : null;
}

function thirteenOrphans(counts: number[]): ThirteenOrphansForm | null {
  let pair: TileValue | null = null;
  for (let i = 0; i < TILE_KINDS; i++) {
    const c = counts[i] ?? 0;
    const orphan = TERMINAL_HONOR_VALUES.includes(i);
    if (!orphan) {
      if (c > 0) return null;
      continue;
    }
    if (c === 0 || c > 2) return null;
    if (c === 2) {
      if (pair !== null) return null;
      pair = i;
    }
  }
  return pair === null ? null : { kind: 'thirteenOrphans', pair };
}

/**
 * All winning decompositions of the concealed tiles plus declared melds.
 * Returns [] when the tile count is wrong or nothing fits.
 */
export function decompose(tiles: readonly Tile[], melds: readonly Meld[]): WinForm[] {
  if (melds.length > 4 || tiles.length !== 14 - 3 * melds.length) return [];

  const counts = countValues(tiles);
  const fixed = melds.map(meldToSet);
  const forms: WinForm[] = [];

  for (let p = 0; p < TILE_KINDS; p++) {
    if ((counts[p] ?? 0) < 2) continue;
    counts[p] = (counts[p] ?? 0) - 2;
    const found: SetBlock[][] = [];
    partitions(counts, [], found);
    counts[p] = (counts[p] ?? 0) + 2;
    for (const sets of found) {
      forms.push({ kind: 'standard', sets: [...fixed, ...sets], pair: p });
    }
  }

  if (melds.length === 0) {
    const sp = sevenPairs(counts);
    if (sp) forms.push(sp);
    const ko = thirteenOrphans(counts);
    if (ko) forms.push(ko);
  }

  return forms;
}

export function isWinningShape(tiles: readonly Tile[], melds: readonly Meld[]): boolean {
  return decompose(tiles, melds).length > 0;
}

/** Values that complete a 13-tile hand. Values already held four times are skipped. */
export function findWaitTiles(tiles: readonly Tile[], melds: readonly Meld[]): TileValue[] {
  if (tiles.length !== 13 - 3 * melds.length) return [];
  const held = countValues([...tiles, ...melds.flatMap((m) => m.tiles)]);
  const waits: TileValue[] = [];
  for (let v = 0; v < TILE_KINDS; v++) {
    if ((held[v] ?? 0) >= 4) continue;
    if (isWinningShape([...tiles, { value: v, red: false }], melds)) waits.push(v);
  }
  return waits;
}

export function isTenpai(tiles: readonly Tile[], melds: readonly Meld[]): boolean {
  return findWaitTiles(tiles, melds).length > 0;
}

function runWait(start: TileValue, win: TileValue): WaitShape | null {
  const r = rankOfIndex(start);
  if (win === start + 1) return 'kanchan';
  if (win === start) return r === 7 ? 'penchan' : 'ryanmen';
  if (win === start + 2) return r === 1 ? 'penchan' : 'ryanmen';
  return null;
}

/** Each concealed group the winning tile could have completed, with its wait shape. */
export function readings(form: StandardForm, win: TileValue, tsumo: boolean): WinReading[] {
  const out: WinReading[] = [];
  const seen = new Set<string>();

  const add = (completed: number, wait: WaitShape) => {
    const key = completed === -1 ? `pair:${wait}` : `${form.sets[completed]?.kind}:${form.sets[completed]?.value}:${wait}`;
    if (seen.has(key)) return;
    seen.add(key);
    const sets = form.sets.map((s, i) =>
      i === completed && !tsumo && s.kind === 'triplet' ? { ...s, open: true } : s,
    );
    out.push({ form: { ...form, sets }, wait, completed });
  };

  if (form.pair === win) add(-1, 'tanki');
  form.sets.forEach((s, i) => {
    if (s.called) return;
    if (s.kind === 'triplet' && s.value === win) add(i, 'shanpon');
    if (s.kind === 'run') {
      const w = runWait(s.value, win);
      if (w) add(i, w);
    }
  });
  return out;
}
