import type { Tile, TileValue } from '../domain/Tile';
import { EAST, isWind, sortTiles, tileLabel, valueLabel } from '../domain/Tile';
import type { Meld } from '../domain/Meld';
import { Wall } from '../domain/Wall';
import { InvariantViolation, invariant } from '../domain/errors';
import { findWaitTiles, isTenpai } from '../domain/HandAnalyzer';
import type { Rng } from '../domain/random';
import { createRng, randomSeed } from '../domain/random';
import type { Action } from './Action';
import { sameAction } from './Action';
import { Player, SEATS, type Seat, seatAfter, toSeat } from './Player';
import type { ResponseWindow } from './claim/types';
import { resolveDeclarations } from './claim/decision';
import { turnOrderAfter } from './claim/utils';
import { type GameSnapshot, buildSnapshot } from './snapshot';
import type { RuleSet } from '../rules/RuleStrategy';
import { getRule } from '../rules/RuleRegistry';
import type { TableView } from '../rules/ActionValidator';
import {
  RIICHI_COST,
  handSlice,
  hasNonPassOption,
  legalActionsOnChankan,
  legalActionsOnDraw,
  legalActionsOnResponse,
  winContext,
} from '../rules/ActionValidator';
import { calculateWinDetails } from '../rules/scoring/calculateWin';
import { scoreChanges } from '../rules/scoring/points';
import { notenPayments } from '../rules/scoring/noten';
import type { AbortiveReason, HandOutcome, HandParameters } from '../rules/progression';
import { firstHandParameters, isGameOver, nextHandParameters } from '../rules/progression';

export type Phase =
  | 'GAME_START'
  | 'DEALING'
  | 'PLAYER_DISCARD'
  | 'WAITING_FOR_RESPONSE'
  | 'ACTION_PROCESSING'
  | 'HAND_OVER_SCORES'
  | 'GAME_OVER';

export type ApplyResult =
  | { ok: true; message: string; phase: Phase; outcome?: HandOutcome }
  | { ok: false; message: string };

export type LastDiscard = { tile: Tile; seat: Seat };

const WIND_NAMES = ['East', 'South', 'West', 'North'];

export class Game {
  readonly rules: RuleSet;

  private seed = 0;
  private rng: Rng = createRng(0);
  private players: [Player, Player, Player, Player];
  private wall: Wall;
  private params: HandParameters = firstHandParameters();
  private nextParams: HandParameters | null = null;
  private phase: Phase = 'GAME_START';
  private acting: Seat = 0;
  private lastDiscard: LastDiscard | null = null;
  private window: ResponseWindow | null = null;
  private rinshan = false;
  private firstGoAround = true;
  private pendingDoraReveals = 0;
  private outcome: HandOutcome | null = null;
  private faulted = false;
  private stackedWalls: Tile[][] = [];
  private handsPlayed = 0;

  constructor(rules: RuleSet = getRule(null)) {
    this.rules = rules;
    this.players = [
      new Player(0, rules.startingScore),
      new Player(1, rules.startingScore),
      new Player(2, rules.startingScore),
      new Player(3, rules.startingScore),
    ];
    this.wall = Wall.shuffled(rules.redFives, this.rng);
  }

  /** Queues a wall (draw order, dead wall last) for the next deal instead of shuffling. */
  stackNextWall(tiles: readonly Tile[]) {
    this.stackedWalls.push(tiles.slice());
  }

  resetGame(seed?: number) {
    this.seed = seed ?? randomSeed();
    this.rng = createRng(this.seed);
    this.players = [
      new Player(0, this.rules.startingScore),
      new Player(1, this.rules.startingScore),
      new Player(2, this.rules.startingScore),
      new Player(3, this.rules.startingScore),
    ];
    this.outcome = null;
    this.nextParams = null;
    this.faulted = false;
    this.handsPlayed = 0;
    this.phase = 'GAME_START';
    this.startHand(firstHandParameters(0));
  }

  /**
   * Deals the next hand after a scored one, or re-deals the current hand.
   */
  resetNewHand(): { ok: boolean; message: string } {
    if (this.faulted) return { ok: false, message: 'game is faulted' };
    if (this.phase === 'GAME_OVER') return { ok: false, message: 'game is over' };
    if (this.phase === 'GAME_START') return { ok: false, message: 'game not started' };
    const params = this.phase === 'HAND_OVER_SCORES' && this.nextParams ? this.nextParams : this.params;
    this.startHand(params);
    return { ok: true, message: `hand ${this.handLabel} dealt` };
  }

  get currentPhase(): Phase {
    return this.phase;
  }

  get currentSeed(): number {
    return this.seed;
  }

  get actingSeat(): Seat {
    return this.acting;
  }

  get handParameters(): HandParameters {
    return { ...this.params };
  }

  get isFaulted(): boolean {
    return this.faulted;
  }

  get isGameOver(): boolean {
    return this.phase === 'GAME_OVER';
  }

  /** e.g. `East 2, 1 honba`. */
  get handLabel(): string {
    const wind = WIND_NAMES[this.params.roundWind] ?? `Wind ${this.params.roundWind}`;
    return `${wind} ${this.params.roundNumber}, ${this.params.honba} honba`;
  }

  snapshot(): GameSnapshot {
    return buildSnapshot(this, SEATS);
  }

  /** Same as snapshot() with every concealed hand but the viewer's hidden; null hides all four. */
  snapshotFor(viewer: Seat | null): GameSnapshot {
    return buildSnapshot(this, viewer === null ? [] : [viewer]);
  }

  getPlayer(seat: Seat): Player {
    return this.players[seat];
  }

  getWall(): Wall {
    return this.wall;
  }

  getLastDiscard(): LastDiscard | null {
    return this.lastDiscard;
  }

  get scores(): [number, number, number, number] {
    return [this.players[0].score, this.players[1].score, this.players[2].score, this.players[3].score];
  }

  /** Outcome of the most recently finished hand. */
  handOutcome(): HandOutcome | null {
    return this.outcome;
  }

  /** Seats that currently owe a decision. */
  actingSeats(): Seat[] {
    if (this.phase === 'PLAYER_DISCARD') return [this.acting];
    if (this.phase === 'WAITING_FOR_RESPONSE' && this.window) {
      const head = this.window.pending[0];
      return head === undefined ? [] : [head];
    }
    return [];
  }

  legalActions(seat: Seat): Action[] {
    if (this.faulted) return [];
    if (this.phase === 'PLAYER_DISCARD') {
      return seat === this.acting ? legalActionsOnDraw(this.players[seat], this.view()) : [];
    }
    if (this.phase === 'WAITING_FOR_RESPONSE' && this.window) {
      if (this.window.pending[0] !== seat) return [];
      return (this.window.options.get(seat) ?? []).slice();
    }
    return [];
  }

  apply(seat: Seat, action: Action): ApplyResult {
    if (this.faulted) return { ok: false, message: 'game is faulted after an internal error' };
    if (this.phase !== 'PLAYER_DISCARD' && this.phase !== 'WAITING_FOR_RESPONSE') {
      return { ok: false, message: `no actions in phase ${this.phase}` };
    }
    const legal = this.legalActions(seat).find((a) => sameAction(a, action));
    if (!legal) return { ok: false, message: `illegal action ${action.type} for seat ${seat}` };

    const handsBefore = this.handsPlayed;
    try {
      const message = this.phase === 'PLAYER_DISCARD' ? this.applyOnTurn(seat, legal) : this.declare(seat, legal);
      this.checkConservation();
      const ended = this.handsPlayed !== handsBefore;
      return ended && this.outcome
        ? { ok: true, message, phase: this.phase, outcome: this.outcome }
        : { ok: true, message, phase: this.phase };
    } catch (e) {
      if (e instanceof InvariantViolation) {
        this.faulted = true;
        console.error('[riichi-table] invariant violation:', e.message);
      }
      throw e;
    }
  }

  private view(): TableView {
    return {
      rules: this.rules,
      dealerSeat: this.params.dealer,
      roundWind: EAST + this.params.roundWind,
      honba: this.params.honba,
      riichiSticks: this.params.riichiSticks,
      liveCount: this.wall.liveCount,
      doraValues: this.wall.doraValues,
      uraValues: this.wall.uraValues,
      firstGoAround: this.firstGoAround,
      rinshan: this.rinshan,
    };
  }

  // ---- hand lifecycle ----

  private startHand(params: HandParameters) {
    this.params = { ...params };
    this.nextParams = null;
    this.phase = 'DEALING';
    this.window = null;
    this.lastDiscard = null;
    this.rinshan = false;
    this.firstGoAround = true;
    this.pendingDoraReveals = 0;

    for (const s of SEATS) {
      this.players[s].resetForHand(EAST + toSeat(s - params.dealer));
    }
    const stacked = this.stackedWalls.shift();
    this.wall = stacked ? Wall.fromTiles(stacked) : Wall.shuffled(this.rules.redFives, this.rng);

    for (let round = 0; round < 13; round++) {
      for (let k = 0; k < 4; k++) {
        const t = this.wall.draw();
        if (!t) {
          this.abort('dealUnderflow');
          return;
        }
        this.players[seatAfter(params.dealer, k)].hand.add(t);
      }
    }
    this.acting = params.dealer;
    this.drawFor(params.dealer);
    this.checkConservation();
  }

  private drawFor(seat: Seat) {
    const t = this.wall.draw();
    if (!t) {
      if (this.phase === 'DEALING') this.abort('dealUnderflow');
      else this.exhaustiveDraw();
      return;
    }
    this.players[seat].drawn = t;
    this.acting = seat;
    this.rinshan = false;
    this.phase = 'PLAYER_DISCARD';
  }

  private endHand(outcome: HandOutcome) {
    SEATS.forEach((s) => {
      this.players[s].score += outcome.scoreChanges[s];
    });
    this.outcome = outcome;
    this.handsPlayed++;
    this.window = null;
    this.phase = 'HAND_OVER_SCORES';

    const next = nextHandParameters(this.params, outcome);
    this.nextParams = next;
    if (isGameOver(next, this.scores, this.rules)) {
      this.phase = 'GAME_OVER';
      return;
    }
    if (this.rules.autoNextHand) this.startHand(next);
  }

  private abort(reason: AbortiveReason) {
    this.endHand({
      endType: 'ABORTIVE_DRAW',
      winner: null,
      loser: null,
      scoreChanges: [0, 0, 0, 0],
      details: null,
      tenpai: null,
      abortiveReason: reason,
    });
  }

  private exhaustiveDraw() {
    const tenpai: [boolean, boolean, boolean, boolean] = [false, false, false, false];
    for (const s of SEATS) {
      const p = this.players[s];
      tenpai[s] = isTenpai(p.concealed, p.melds);
    }
    this.endHand({
      endType: 'EXHAUSTIVE_DRAW',
      winner: null,
      loser: null,
      scoreChanges: notenPayments(tenpai),
      details: null,
      tenpai,
      abortiveReason: null,
    });
  }

  // ---- acting seat ----

  private applyOnTurn(seat: Seat, action: Action): string {
    const p = this.players[seat];
    switch (action.type) {
      case 'discard':
      case 'riichi':
        return this.discard(p, action.tile, action.type === 'riichi');
      case 'tsumo':
        return this.tsumo(p);
      case 'kan':
        if (action.kind === 'closed') return this.closedKan(p, action.value);
        if (action.kind === 'added') return this.addedKan(p, action.value);
        throw new InvariantViolation('open kan offered on own turn');
      case 'abortiveDraw':
        this.abort('nineTerminals');
        return `seat ${seat} declares nine terminals`;
      case 'ron':
      case 'pon':
      case 'chi':
      case 'pass':
        throw new InvariantViolation(`${action.type} offered on own turn`);
    }
  }

  private discard(p: Player, tile: Tile, riichi: boolean): string {
    const drawn = p.drawn;
    const tsumogiri = drawn !== null && drawn.value === tile.value && drawn.red === tile.red;
    if (tsumogiri) {
      p.drawn = null;
    } else {
      p.hand.remove(tile);
      p.mergeDrawn();
    }

    if (riichi) {
      p.riichi = true;
      p.doubleRiichi = this.firstGoAround && p.discards.length === 0;
      p.ippatsu = true;
      p.riichiDiscardIndex = p.discards.length;
      p.score -= RIICHI_COST;
      this.params.riichiSticks++;
    } else {
      p.ippatsu = false;
    }
    if (p.discards.length > 0) this.firstGoAround = false;

    p.tempFuriten = false;
    p.discards.push({ tile, tsumogiri, riichi, calledBy: null });
    this.lastDiscard = { tile, seat: p.seat };
    this.rinshan = false;

    while (this.pendingDoraReveals > 0) {
      this.wall.revealNewDora();
      this.pendingDoraReveals--;
    }

    this.openWindow('discard', tile, p.seat);
    return `seat ${p.seat} ${riichi ? 'declares riichi with' : 'discards'} ${tileLabel(tile)}`;
  }

  private tsumo(p: Player): string {
    const drawn = p.drawn;
    invariant(drawn, `seat ${p.seat} has no drawn tile to win on`);
    const details = calculateWinDetails(handSlice(p), drawn, winContext(p, this.view(), { type: 'tsumo' }));
    invariant(details.isValid, `tsumo offered to seat ${p.seat} but scored invalid: ${details.reason}`);
    this.endHand({
      endType: 'TSUMO',
      winner: p.seat,
      loser: null,
      scoreChanges: scoreChanges(p.seat, details.payments, details.stickBonus),
      details,
      tenpai: null,
      abortiveReason: null,
    });
    return `seat ${p.seat} tsumo on ${tileLabel(drawn)}`;
  }

  private takeFromHand(p: Player, value: TileValue, n: number): Tile[] {
    const taken: Tile[] = [];
    for (let i = 0; i < n; i++) {
      const t = p.hand.list.find((x) => x.value === value);
      invariant(t, `seat ${p.seat} lacks ${valueLabel(value)}`);
      taken.push(p.hand.remove(t));
    }
    return taken;
  }

  private interrupt() {
    this.firstGoAround = false;
    for (const s of SEATS) this.players[s].ippatsu = false;
  }

  private closedKan(p: Player, value: TileValue): string {
    p.mergeDrawn();
    const [a, b, c, d] = this.takeFromHand(p, value, 4);
    invariant(a && b && c && d, 'closed kan needs four tiles');
    p.melds.push({ type: 'kan', kind: 'closed', tiles: [a, b, c, d], fromSeat: null, calledTile: null });
    this.interrupt();
    this.processKan(p.seat);
    return `seat ${p.seat} closed kan ${valueLabel(value)}`;
  }

  private addedKan(p: Player, value: TileValue): string {
    p.mergeDrawn();
    const idx = p.melds.findIndex((m) => m.type === 'pon' && m.tiles[0].value === value);
    const pon = p.melds[idx];
    invariant(pon && pon.type === 'pon', `seat ${p.seat} has no pon of ${valueLabel(value)}`);
    const [added] = this.takeFromHand(p, value, 1);
    invariant(added, 'added kan needs a fourth tile');
    const [a, b, c] = pon.tiles;
    const kan: Meld = { type: 'kan', kind: 'added', tiles: [a, b, c, added], fromSeat: pon.fromSeat, calledTile: pon.calledTile };
    p.melds[idx] = kan;
    this.interrupt();
    this.openWindow('chankan', added, p.seat);
    return `seat ${p.seat} added kan ${valueLabel(value)}`;
  }

  /** Dora reveal and replacement draw after any kan. */
  private processKan(seat: Seat) {
    this.phase = 'ACTION_PROCESSING';
    if (this.rules.kanDoraTiming === 'immediate') this.wall.revealNewDora();
    else this.pendingDoraReveals++;

    const t = this.wall.drawReplacement();
    if (!t) {
      this.abort('replacementExhausted');
      return;
    }
    this.players[seat].drawn = t;
    this.acting = seat;
    this.rinshan = true;
    this.phase = 'PLAYER_DISCARD';
  }

  // ---- responses ----

  private openWindow(kind: ResponseWindow['kind'], tile: Tile, fromSeat: Seat) {
    const view = this.view();
    const options = new Map<Seat, Action[]>();
    const pending: Seat[] = [];
    for (const s of turnOrderAfter(fromSeat)) {
      const p = this.players[s];
      const opts = kind === 'discard' ? legalActionsOnResponse(p, view, tile, fromSeat) : legalActionsOnChankan(p, view, tile, fromSeat);
      if (!hasNonPassOption(opts)) continue;
      options.set(s, opts);
      pending.push(s);
    }

    if (pending.length === 0) {
      this.closeWindow(kind, tile, fromSeat, null);
      return;
    }
    this.window = { kind, tile, fromSeat, pending, options, declarations: new Map() };
    this.phase = 'WAITING_FOR_RESPONSE';
  }

  private declare(seat: Seat, action: Action): string {
    const w = this.window;
    invariant(w, 'no response window');
    invariant(w.pending[0] === seat, `seat ${seat} is not next to respond`);
    w.pending.shift();
    w.declarations.set(seat, action);
    if (w.pending.length === 0) {
      const res = resolveDeclarations(w.declarations, w.fromSeat);
      this.window = null;
      this.closeWindow(w.kind, w.tile, w.fromSeat, res);
    }
    return `seat ${seat} declares ${action.type}`;
  }

  // A winning tile that went by makes the seat furiten.
  private markFuriten(tile: Tile, fromSeat: Seat) {
    for (const s of turnOrderAfter(fromSeat)) {
      const p = this.players[s];
      if (!findWaitTiles(p.hand.list, p.melds).includes(tile.value)) continue;
      p.tempFuriten = true;
      if (p.riichi) p.riichiFuriten = true;
    }
  }

  private closeWindow(kind: ResponseWindow['kind'], tile: Tile, fromSeat: Seat, res: { action: Action; seat: Seat } | null) {
    if (res?.action.type === 'ron') {
      this.ron(this.players[res.seat], tile, fromSeat, kind === 'chankan');
      return;
    }
    this.markFuriten(tile, fromSeat);

    if (kind === 'chankan') {
      this.processKan(fromSeat);
      return;
    }
    if (!res) {
      this.afterAllPass(fromSeat);
      return;
    }

    const caller = this.players[res.seat];
    const discarder = this.players[fromSeat];
    const entry = discarder.discards[discarder.discards.length - 1];
    invariant(entry && entry.tile === tile, 'called tile is not the last discard');
    entry.calledBy = caller.seat;
    this.interrupt();

    const a = res.action;
    if (a.type === 'pon' || a.type === 'chi') {
      for (const t of a.tiles) caller.hand.remove(t);
      const [x, y, z] = sortTiles([a.tiles[0], a.tiles[1], tile]);
      invariant(x && y && z, 'call needs three tiles');
      caller.melds.push({ type: a.type, tiles: [x, y, z], fromSeat, calledTile: tile });
      this.acting = caller.seat;
      this.phase = 'PLAYER_DISCARD';
      return;
    }
    if (a.type === 'kan') {
      const [x, y, z] = this.takeFromHand(caller, tile.value, 3);
      invariant(x && y && z, 'open kan needs three tiles');
      caller.melds.push({ type: 'kan', kind: 'open', tiles: [x, y, z, tile], fromSeat, calledTile: tile });
      this.processKan(caller.seat);
      return;
    }
    throw new InvariantViolation(`cannot resolve ${a.type}`);
  }

  private ron(p: Player, tile: Tile, fromSeat: Seat, chankan: boolean) {
    const ctx = winContext(p, this.view(), { type: 'ron', from: fromSeat }, { chankan });
    const details = calculateWinDetails(handSlice(p), tile, ctx);
    invariant(details.isValid, `ron offered to seat ${p.seat} but scored invalid: ${details.reason}`);
    this.endHand({
      endType: 'RON',
      winner: p.seat,
      loser: fromSeat,
      scoreChanges: scoreChanges(p.seat, details.payments, details.stickBonus),
      details,
      tenpai: null,
      abortiveReason: null,
    });
  }

  private afterAllPass(fromSeat: Seat) {
    if (this.rules.abortiveDraws) {
      if (this.players.every((p) => p.riichi)) {
        this.abort('fourRiichi');
        return;
      }
      if (this.firstGoAround && this.isFourWinds()) {
        this.abort('fourWinds');
        return;
      }
    }
    if (this.wall.liveCount === 0) {
      this.exhaustiveDraw();
      return;
    }
    this.drawFor(seatAfter(fromSeat));
  }

  private isFourWinds(): boolean {
    const firsts = this.players.map((p) => (p.discards.length === 1 ? p.discards[0]?.tile.value : undefined));
    const v = firsts[0];
    return v !== undefined && isWind(v) && firsts.every((x) => x === v);
  }

  private checkConservation() {
    const held = this.players.reduce((a, p) => a + p.tileCount, 0);
    const total = held + this.wall.remaining;
    if (total !== this.wall.size) {
      throw new InvariantViolation(`tile count ${total} != ${this.wall.size}`);
    }
  }
}
