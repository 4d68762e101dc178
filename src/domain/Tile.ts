export type Suit = 'm' | 'p' | 's' | 'z';

/** 0-8 man, 9-17 pin, 18-26 sou, 27-30 east..north, 31-33 white/green/red dragon. */
export type TileValue = number;

export type Tile = {
  readonly value: TileValue;
  readonly red: boolean;
};

export const TILE_KINDS = 34;

export const SUITS: Suit[] = ['m', 'p', 's', 'z'];

export const EAST = 27;
export const SOUTH = 28;
export const WEST = 29;
export const NORTH = 30;
export const WHITE = 31;
export const GREEN = 32;
export const RED = 33;

/** Values that can exist as a red five: 5m, 5p, 5s. */
export const FIVE_VALUES = [4, 13, 22] as const;

export function isTileValue(v: number): boolean {
  return Number.isInteger(v) && v >= 0 && v < TILE_KINDS;
}

export function makeTile(value: TileValue, red = false): Tile {
  if (!isTileValue(value)) throw new RangeError(`bad tile value ${value}`);
  if (red && !FIVE_VALUES.some((v) => v === value)) throw new RangeError(`tile ${value} cannot be red`);
  return Object.freeze({ value, red });
}

export function suitOfIndex(i: TileValue): Suit {
  if (i < 9) return 'm';
  if (i < 18) return 'p';
  if (i < 27) return 's';
  return 'z';
}

export function rankOfIndex(i: TileValue): number {
  if (i < 27) return (i % 9) + 1;
  return i - 27 + 1;
}

export function isHonor(v: TileValue): boolean {
  return v >= 27;
}

export function isTerminal(v: TileValue): boolean {
  return v < 27 && (v % 9 === 0 || v % 9 === 8);
}

export function isTerminalOrHonor(v: TileValue): boolean {
  return isHonor(v) || isTerminal(v);
}

export function isSimple(v: TileValue): boolean {
  return !isTerminalOrHonor(v);
}

export function isWind(v: TileValue): boolean {
  return v >= EAST && v <= NORTH;
}

export function isDragon(v: TileValue): boolean {
  return v >= WHITE && v <= RED;
}

export const TERMINAL_HONOR_VALUES: TileValue[] = [0, 8, 9, 17, 18, 26, 27, 28, 29, 30, 31, 32, 33];

/** The dora a given indicator points at: 9 wraps to 1, winds cycle E-S-W-N, dragons W-G-R. */
export function nextDoraValue(indicator: TileValue): TileValue {
  if (indicator < 27) {
    const base = indicator - (indicator % 9);
    return base + ((indicator % 9) + 1) % 9;
  }
  if (indicator <= NORTH) return EAST + ((indicator - EAST + 1) % 4);
  return WHITE + ((indicator - WHITE + 1) % 3);
}

export function compareTiles(a: Tile, b: Tile): number {
  if (a.value !== b.value) return a.value - b.value;
  return Number(a.red) - Number(b.red);
}

export function sameTile(a: Tile, b: Tile): boolean {
  return a.value === b.value && a.red === b.red;
}

export function sortTiles(tiles: readonly Tile[]): Tile[] {
  return tiles.slice().sort(compareTiles);
}

export function countValues(tiles: readonly Tile[]): number[] {
  const counts = new Array<number>(TILE_KINDS).fill(0);
  for (const t of tiles) counts[t.value] = (counts[t.value] ?? 0) + 1;
  return counts;
}

/** Single tile label such as `5m`, `0p` (red five) or `7z`. */
export function tileLabel(t: Tile): string {
  const suit = suitOfIndex(t.value);
  return `${t.red ? 0 : rankOfIndex(t.value)}${suit}`;
}

export function valueLabel(v: TileValue): string {
  return `${rankOfIndex(v)}${suitOfIndex(v)}`;
}

/** Compact notation: `123m0p55z`. */
export function formatTiles(tiles: readonly Tile[]): string {
  let out = '';
  let digits = '';
  let current: Suit | null = null;
  for (const t of tiles) {
    const suit = suitOfIndex(t.value);
    if (current !== null && suit !== current) {
      out += digits + current;
      digits = '';
    }
    current = suit;
    digits += t.red ? '0' : String(rankOfIndex(t.value));
  }
  if (current !== null) out += digits + current;
  return out;
}

/** Parses compact notation; `0` stands for the red five of its suit. */
export function parseTiles(text: string): Tile[] {
  const tiles: Tile[] = [];
  let pending: number[] = [];
  for (const ch of text.replace(/\s+/g, '')) {
    if (ch >= '0' && ch <= '9') {
      pending.push(Number(ch));
      continue;
    }
    const suit = SUITS.find((s) => s === ch);
    if (!suit) throw new SyntaxError(`unexpected '${ch}' in tile notation`);
    if (pending.length === 0) throw new SyntaxError(`suit '${ch}' without ranks`);
    const offset = SUITS.indexOf(suit) * 9;
    for (const n of pending) {
      if (suit === 'z') {
        if (n < 1 || n > 7) throw new SyntaxError(`bad honor rank ${n}`);
        tiles.push(makeTile(offset + n - 1));
      } else if (n === 0) {
        tiles.push(makeTile(offset + 4, true));
      } else {
        tiles.push(makeTile(offset + n - 1));
      }
    }
    pending = [];
  }
  if (pending.length > 0) throw new SyntaxError('ranks without a suit');
  return tiles;
}

export function parseTile(text: string): Tile {
  const [tile, ...rest] = parseTiles(text);
  if (!tile || rest.length > 0) throw new SyntaxError(`expected exactly one tile in '${text}'`);
  return tile;
}
