import type { Tile, TileValue } from '../domain/Tile';
import { EAST } from '../domain/Tile';
import type { Meld } from '../domain/Meld';
import { isOpenMeld } from '../domain/Meld';
import { MahjongHand } from '../domain/MahjongHand';

export type Seat = 0 | 1 | 2 | 3;

export const SEATS: readonly Seat[] = [0, 1, 2, 3];

export function toSeat(n: number): Seat {
  const m = ((n % 4) + 4) % 4;
  if (m === 0) return 0;
  if (m === 1) return 1;
  if (m === 2) return 2;
  return 3;
}

/** Seat `n` places after `s` in turn order. */
export function seatAfter(s: Seat, n = 1): Seat {
  return toSeat(s + n);
}

export type DiscardEntry = {
  tile: Tile;
  /** Discarded straight from the draw. */
  tsumogiri: boolean;
  /** The tile turned sideways for a riichi declaration. */
  riichi: boolean;
  /** Set once another seat calls the tile; it then lives in that seat's meld. */
  calledBy: Seat | null;
};

export class Player {
  hand = new MahjongHand();
  melds: Meld[] = [];
  discards: DiscardEntry[] = [];
  drawn: Tile | null = null;

  riichi = false;
  doubleRiichi = false;
  riichiDiscardIndex: number | null = null;
  ippatsu = false;

  /** A winning tile went by since this seat last discarded. */
  tempFuriten = false;
  /** A winning tile went by after riichi; lasts for the hand. */
  riichiFuriten = false;

  seatWind: TileValue = EAST;

  constructor(
    public readonly seat: Seat,
    public score: number,
  ) {}

  resetForHand(seatWind: TileValue) {
    this.hand = new MahjongHand();
    this.melds = [];
    this.discards = [];
    this.drawn = null;
    this.riichi = false;
    this.doubleRiichi = false;
    this.riichiDiscardIndex = null;
    this.ippatsu = false;
    this.tempFuriten = false;
    this.riichiFuriten = false;
    this.seatWind = seatWind;
  }

  get menzen(): boolean {
    return !this.melds.some(isOpenMeld);
  }

  /** Hand plus the drawn tile. */
  get concealed(): Tile[] {
    return this.drawn ? [...this.hand.list, this.drawn] : this.hand.list;
  }

  /** Moves the drawn tile into the sorted hand. */
  mergeDrawn() {
    if (this.drawn) this.hand.add(this.drawn);
    this.drawn = null;
  }

  get discardValues(): TileValue[] {
    return this.discards.map((d) => d.tile.value);
  }

  /** Tiles this seat physically holds or has in its pond. */
  get tileCount(): number {
    const pond = this.discards.filter((d) => d.calledBy === null).length;
    const meldTiles = this.melds.reduce((a, m) => a + m.tiles.length, 0);
    return this.hand.size + (this.drawn ? 1 : 0) + meldTiles + pond;
  }
}
