import type { Tile, TileValue } from '../domain/Tile';
import { TERMINAL_HONOR_VALUES, countValues } from '../domain/Tile';
import type { Meld } from '../domain/Meld';
import { findWaitTiles, isTenpai } from '../domain/HandAnalyzer';
import type { Action } from '../game/Action';
import type { Player, Seat } from '../game/Player';
import { seatAfter } from '../game/Player';
import { chiOptions } from '../game/claim/chi';
import { distinctTiles, pairChoices, withoutTile } from '../game/claim/common';
import type { RuleSet } from './RuleStrategy';
import type { HandSlice, WinBy, WinContext } from './scoring/context';
import { isValidWin } from './scoring/calculateWin';

/** Read-only table facts the validator needs besides the acting player. */
export type TableView = {
  rules: RuleSet;
  dealerSeat: Seat;
  roundWind: TileValue;
  honba: number;
  riichiSticks: number;
  liveCount: number;
  doraValues: readonly TileValue[];
  uraValues: readonly TileValue[];
  /** No call has happened and nobody has finished a first discard cycle. */
  firstGoAround: boolean;
  /** The acting seat's drawn tile came off the dead wall. */
  rinshan: boolean;
};

export const RIICHI_COST = 1000;

export function handSlice(player: Player): HandSlice {
  return {
    tiles: player.hand.list,
    melds: player.melds,
    discards: player.discardValues,
    tempFuriten: player.tempFuriten,
    riichiFuriten: player.riichiFuriten,
  };
}

export function winContext(
  player: Player,
  view: TableView,
  winBy: WinBy,
  extra: { chankan?: boolean } = {},
): WinContext {
  const tsumo = winBy.type === 'tsumo';
  const chankan = extra.chankan ?? false;
  return {
    winner: player.seat,
    dealerSeat: view.dealerSeat,
    winBy,
    seatWind: player.seatWind,
    roundWind: view.roundWind,
    riichi: player.riichi,
    doubleRiichi: player.doubleRiichi,
    ippatsu: player.ippatsu,
    haitei: tsumo && view.liveCount === 0 && !view.rinshan,
    houtei: !tsumo && !chankan && view.liveCount === 0,
    rinshan: tsumo && view.rinshan,
    chankan,
    firstDraw: tsumo && view.firstGoAround && player.discards.length === 0,
    doraValues: view.doraValues,
    uraValues: view.uraValues,
    openTanyao: view.rules.openTanyao,
    honba: view.honba,
    riichiSticks: view.riichiSticks,
  };
}

function sameWaits(a: readonly TileValue[], b: readonly TileValue[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function closedKanMeld(tiles: Tile[]): Meld | null {
  const [a, b, c, d] = tiles;
  if (!a || !b || !c || !d) return null;
  return { type: 'kan', kind: 'closed', tiles: [a, b, c, d], fromSeat: null, calledTile: null };
}

// After riichi a closed kan must not change the waits.
function kanKeepsWaits(player: Player, value: TileValue): boolean {
  const before = findWaitTiles(player.hand.list, player.melds);
  const concealed = player.concealed;
  const quad = concealed.filter((t) => t.value === value);
  const meld = closedKanMeld(quad);
  if (!meld) return false;
  const rest = concealed.filter((t) => t.value !== value);
  const after = findWaitTiles(rest, [...player.melds, meld]);
  return before.length > 0 && sameWaits(before, after);
}

function selfKans(player: Player, view: TableView): Action[] {
  if (view.liveCount === 0) return [];
  const drawn = player.drawn;
  if (!drawn) return [];
  const out: Action[] = [];
  const counts = countValues(player.concealed);

  counts.forEach((c, value) => {
    if (c < 4) return;
    if (player.riichi && (drawn.value !== value || !kanKeepsWaits(player, value))) return;
    out.push({ type: 'kan', kind: 'closed', value });
  });

  if (!player.riichi) {
    for (const m of player.melds) {
      if (m.type !== 'pon') continue;
      const v = m.tiles[0].value;
      if ((counts[v] ?? 0) >= 1) out.push({ type: 'kan', kind: 'added', value: v });
    }
  }
  return out;
}

function isNineTerminals(player: Player, view: TableView): boolean {
  if (!view.rules.abortiveDraws || !view.firstGoAround || player.discards.length > 0 || !player.drawn) return false;
  const counts = countValues(player.concealed);
  return TERMINAL_HONOR_VALUES.filter((v) => (counts[v] ?? 0) > 0).length >= 9;
}

/**
 * Options of the seat whose turn it is. Without a drawn tile (right after
 * chi/pon) only discards are offered.
 */
export function legalActionsOnDraw(player: Player, view: TableView): Action[] {
  const drawn = player.drawn;
  if (!drawn) {
    return distinctTiles(player.hand.list).map((tile) => ({ type: 'discard', tile }));
  }

  const out: Action[] = [];
  const concealed = player.concealed;

  if (player.riichi) {
    out.push({ type: 'discard', tile: drawn });
  } else {
    for (const tile of distinctTiles(concealed)) out.push({ type: 'discard', tile });
  }

  const kans = selfKans(player, view);
  const tsumo = isValidWin(handSlice(player), drawn, winContext(player, view, { type: 'tsumo' }));

  // Riichi is not offered alongside tsumo or a kan.
  if (!tsumo && kans.length === 0 && !player.riichi && player.menzen && player.score >= RIICHI_COST && view.liveCount >= 4) {
    for (const tile of distinctTiles(concealed)) {
      const rest = withoutTile(concealed, tile);
      if (rest && isTenpai(rest, player.melds)) out.push({ type: 'riichi', tile });
    }
  }

  out.push(...kans);

  if (tsumo) out.push({ type: 'tsumo' });

  if (isNineTerminals(player, view)) out.push({ type: 'abortiveDraw' });

  return out;
}

/**
 * Options of `player` after `discarder` threw `tile`. Always ends with pass;
 * a lone pass means the seat has nothing to say.
 */
export function legalActionsOnResponse(player: Player, view: TableView, tile: Tile, discarder: Seat): Action[] {
  if (player.seat === discarder) return [];
  const out: Action[] = [];

  if (isValidWin(handSlice(player), tile, winContext(player, view, { type: 'ron', from: discarder }))) {
    out.push({ type: 'ron' });
  }

  // No calls on the last discard, and none at all after riichi.
  if (!player.riichi && view.liveCount > 0) {
    const hand = player.hand.list;
    for (const tiles of pairChoices(hand, tile.value)) out.push({ type: 'pon', tiles });
    if (player.hand.count(tile.value) >= 3) {
      out.push({ type: 'kan', kind: 'open', value: tile.value });
    }
    if (player.seat === seatAfter(discarder)) {
      for (const tiles of chiOptions(hand, tile)) out.push({ type: 'chi', tiles });
    }
  }

  out.push({ type: 'pass' });
  return out;
}

/** Robbing an added kan: ron or pass. */
export function legalActionsOnChankan(player: Player, view: TableView, tile: Tile, kanSeat: Seat): Action[] {
  if (player.seat === kanSeat) return [];
  const out: Action[] = [];
  const ctx = winContext(player, view, { type: 'ron', from: kanSeat }, { chankan: true });
  if (isValidWin(handSlice(player), tile, ctx)) out.push({ type: 'ron' });
  out.push({ type: 'pass' });
  return out;
}

export function hasNonPassOption(actions: readonly Action[]): boolean {
  return actions.some((a) => a.type !== 'pass');
}
