import { Game } from './Game';
import type { Seat } from './Player';
import type { RuleSet } from '../rules/RuleStrategy';
import type { EndType, ScoreTuple } from '../rules/progression';

export type HandRecord = {
  hand: string;
  endType: EndType;
  winner: Seat | null;
  loser: Seat | null;
  yaku: string[];
  han: number;
  fu: number;
  scoreChanges: ScoreTuple;
};

/**
 * One engine instance behind a room. The first client to join drives every
 * seat; later clients only watch.
 */
export class Table {
  readonly game: Game;
  controllerId: string | null = null;
  history: HandRecord[] = [];
  message = 'waiting for a controller';
  lastActiveMs: number = Date.now();

  constructor(readonly rules: RuleSet) {
    this.game = new Game(rules);
  }

  touch() {
    this.lastActiveMs = Date.now();
  }

  /** Takes the controller slot if free (or already ours); otherwise joins as spectator. */
  join(clientId: string): { role: 'controller' | 'spectator' } {
    this.touch();
    if (this.controllerId === null || this.controllerId === clientId) {
      this.controllerId = clientId;
      return { role: 'controller' };
    }
    return { role: 'spectator' };
  }

  isController(clientId: string): boolean {
    return this.controllerId === clientId;
  }

  get started(): boolean {
    return this.game.currentPhase !== 'GAME_START';
  }

  reset(clientId: string, seed?: number): { ok: boolean; message: string } {
    if (!this.isController(clientId)) return { ok: false, message: 'only the controller can reset' };
    this.game.resetGame(seed);
    this.history = [];
    this.message = `new game, seed ${this.game.currentSeed}`;
    this.touch();
    return { ok: true, message: this.message };
  }

  /** Applies the seat's legal action at `index` of legalActions(seat). */
  applyByIndex(clientId: string, seat: Seat, index: number): { ok: boolean; message: string } {
    if (!this.isController(clientId)) return { ok: false, message: 'only the controller can act' };
    const action = this.game.legalActions(seat)[index];
    if (!action) return { ok: false, message: `seat ${seat} has no action #${index}` };

    const hand = this.game.handLabel;
    const r = this.game.apply(seat, action);
    this.touch();
    if (!r.ok) return r;

    this.message = r.message;
    const o = r.outcome;
    if (o) {
      this.history.push({
        hand,
        endType: o.endType,
        winner: o.winner,
        loser: o.loser,
        yaku: o.details?.yaku.map((y) => y.name) ?? [],
        han: o.details?.han ?? 0,
        fu: o.details?.fu ?? 0,
        scoreChanges: o.scoreChanges,
      });
      this.message = `${hand}: ${o.endType}`;
    }
    return { ok: true, message: this.message };
  }

  nextHand(clientId: string): { ok: boolean; message: string } {
    if (!this.isController(clientId)) return { ok: false, message: 'only the controller can deal' };
    const r = this.game.resetNewHand();
    if (r.ok) this.message = r.message;
    this.touch();
    return r;
  }
}
