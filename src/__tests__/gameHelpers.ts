import { tileLabel } from '../domain/Tile';
import type { StackedWall } from '../domain/debugTile';
import { makeStackedWallTiles } from '../domain/debugTile';
import type { Action } from '../game/Action';
import { actionKey } from '../game/Action';
import type { ApplyResult } from '../game/Game';
import { Game } from '../game/Game';
import type { Seat } from '../game/Player';
import type { RuleSet } from '../rules/RuleStrategy';
import { getRule } from '../rules/RuleRegistry';

export function stackedGame(wall: StackedWall, rules: RuleSet = getRule(null)): Game {
  const game = new Game(rules);
  game.stackNextWall(makeStackedWallTiles(wall));
  game.resetGame(1);
  return game;
}

export function legalKeys(game: Game, seat: Seat): string[] {
  return game.legalActions(seat).map(actionKey);
}

export function keyed(game: Game, seat: Seat, key: string): Action {
  const found = game.legalActions(seat).find((a) => actionKey(a) === key);
  if (!found) throw new Error(`seat ${seat} cannot ${key}; legal: ${legalKeys(game, seat).join(', ')}`);
  return found;
}

export function act(game: Game, seat: Seat, key: string): ApplyResult {
  const r = game.apply(seat, keyed(game, seat, key));
  if (!r.ok) throw new Error(r.message);
  return r;
}

/** Passes for every queued responder; returns the last result, if any. */
export function passWindow(game: Game): ApplyResult | null {
  let last: ApplyResult | null = null;
  while (game.currentPhase === 'WAITING_FOR_RESPONSE') {
    const [seat] = game.actingSeats();
    if (seat === undefined) break;
    last = act(game, seat, 'pass');
  }
  return last;
}

/** The acting seat throws its drawn tile and every responder passes. */
export function discardDrawn(game: Game): ApplyResult {
  const seat = game.actingSeat;
  const drawn = game.getPlayer(seat).drawn;
  if (!drawn) throw new Error(`seat ${seat} has no drawn tile`);
  const r = act(game, seat, `discard:${tileLabel(drawn)}`);
  return passWindow(game) ?? r;
}
