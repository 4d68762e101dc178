import type { Action } from '../game/Action';
import { actionKey } from '../game/Action';
import type { Seat } from '../game/Player';
import type { GameSnapshot } from '../game/snapshot';
import type { HandRecord, Table } from '../game/Table';

export type SeatOptions = {
  seat: Seat;
  actions: Array<{ index: number; key: string; action: Action }>;
};

export type PublicState = {
  connected: boolean;
  role: 'controller' | 'spectator';
  rules: string;
  started: boolean;
  message: string;
  game: GameSnapshot | null;
  /** Only sent to the controller. */
  legal: SeatOptions[];
  history: HandRecord[];
};

export function legalOptions(table: Table): SeatOptions[] {
  return table.game.actingSeats().map((seat) => ({
    seat,
    actions: table.game.legalActions(seat).map((action, index) => ({ index, key: actionKey(action), action })),
  }));
}

export function stateFor(table: Table, clientId: string, connected: boolean): PublicState {
  const controller = table.isController(clientId);
  const started = table.started;
  let game: GameSnapshot | null = null;
  if (started) game = controller ? table.game.snapshot() : table.game.snapshotFor(null);

  return {
    connected,
    role: controller ? 'controller' : 'spectator',
    rules: table.rules.id,
    started,
    message: table.message,
    game,
    legal: controller && started ? legalOptions(table) : [],
    history: table.history.slice(),
  };
}
