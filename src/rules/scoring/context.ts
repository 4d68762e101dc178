import type { Tile, TileValue } from '../../domain/Tile';
import type { Meld } from '../../domain/Meld';
import type { WaitShape } from '../../domain/HandAnalyzer';
import type { Seat } from '../../game/Player';

export type WinBy = { type: 'tsumo' } | { type: 'ron'; from: Seat };

/** Everything about the table a win is scored against. */
export type WinContext = {
  winner: Seat;
  dealerSeat: Seat;
  winBy: WinBy;
  seatWind: TileValue;
  roundWind: TileValue;
  riichi: boolean;
  doubleRiichi: boolean;
  ippatsu: boolean;
  /** Tsumo on the last live tile. */
  haitei: boolean;
  /** Ron on the last discard. */
  houtei: boolean;
  /** Tsumo on a kan replacement tile. */
  rinshan: boolean;
  /** Ron on another seat's added kan. */
  chankan: boolean;
  /** Tsumo on the first draw of an uninterrupted go-around. */
  firstDraw: boolean;
  doraValues: readonly TileValue[];
  uraValues: readonly TileValue[];
  openTanyao: boolean;
  honba: number;
  riichiSticks: number;
};

/** The winner's side of the table, without the winning tile. */
export type HandSlice = {
  tiles: readonly Tile[];
  melds: readonly Meld[];
  /** Values of every tile this seat discarded this hand, called or not. */
  discards: readonly TileValue[];
  tempFuriten: boolean;
  riichiFuriten: boolean;
};

export type YakuName =
  | 'riichi'
  | 'doubleRiichi'
  | 'ippatsu'
  | 'menzenTsumo'
  | 'haitei'
  | 'houtei'
  | 'rinshan'
  | 'chankan'
  | 'tanyao'
  | 'haku'
  | 'hatsu'
  | 'chun'
  | 'seatWind'
  | 'roundWind'
  | 'pinfu'
  | 'iipeikou'
  | 'ryanpeikou'
  | 'sanshoku'
  | 'ittsuu'
  | 'chanta'
  | 'junchan'
  | 'toitoi'
  | 'sanankou'
  | 'sanshokuDoukou'
  | 'sankantsu'
  | 'honroutou'
  | 'shousangen'
  | 'chiitoitsu'
  | 'honitsu'
  | 'chinitsu'
  // yakuman
  | 'kokushi'
  | 'suuankou'
  | 'daisangen'
  | 'shousuushii'
  | 'daisuushii'
  | 'tsuuiisou'
  | 'chinroutou'
  | 'ryuuiisou'
  | 'chuurenpoutou'
  | 'suukantsu'
  | 'tenhou'
  | 'chiihou';

export type Yaku = { name: YakuName; han: number };

export type LimitName = 'mangan' | 'haneman' | 'baiman' | 'sanbaiman' | 'kazoeYakuman' | 'yakuman';

export type Payment = { from: Seat; amount: number };

export type WinDetails = {
  isValid: boolean;
  reason?: string;
  yaku: Yaku[];
  /** Yaku han plus dora; 13 per yakuman. */
  han: number;
  fu: number;
  dora: number;
  akaDora: number;
  uraDora: number;
  yakuman: number;
  limit: LimitName | null;
  basePoints: number;
  /** Paid by the other seats, honba included. */
  points: number;
  payments: Payment[];
  /** Riichi sticks collected from the pool. */
  stickBonus: number;
  wait: WaitShape | null;
};

export function invalidWin(reason: string): WinDetails {
  return {
    isValid: false,
    reason,
    yaku: [],
    han: 0,
    fu: 0,
    dora: 0,
    akaDora: 0,
    uraDora: 0,
    yakuman: 0,
    limit: null,
    basePoints: 0,
    points: 0,
    payments: [],
    stickBonus: 0,
    wait: null,
  };
}

export function isTsumo(ctx: WinContext): boolean {
  return ctx.winBy.type === 'tsumo';
}

export function isDealerWin(ctx: WinContext): boolean {
  return ctx.winner === ctx.dealerSeat;
}
