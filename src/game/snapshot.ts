import type { Tile } from '../domain/Tile';
import type { Meld } from '../domain/Meld';
import type { HandOutcome, HandParameters } from '../rules/progression';
import type { Game, LastDiscard, Phase } from './Game';
import type { DiscardEntry, Seat } from './Player';
import { SEATS } from './Player';

export type SeatSnapshot = {
  seat: Seat;
  score: number;
  seatWind: number;
  /** Null when hidden from the viewer. */
  hand: Tile[] | null;
  handCount: number;
  drawn: Tile | null;
  hasDrawn: boolean;
  melds: Meld[];
  discards: DiscardEntry[];
  riichi: boolean;
  /** Index into `discards` of the riichi declaration tile. */
  riichiDiscardIndex: number | null;
};

export type GameSnapshot = {
  phase: Phase;
  seed: number;
  hand: HandParameters;
  acting: Seat;
  actingSeats: Seat[];
  liveCount: number;
  doraIndicators: Tile[];
  lastDiscard: LastDiscard | null;
  seats: SeatSnapshot[];
  outcome: HandOutcome | null;
};

export function buildSnapshot(game: Game, visible: readonly Seat[]): GameSnapshot {
  const wall = game.getWall();
  return {
    phase: game.currentPhase,
    seed: game.currentSeed,
    hand: game.handParameters,
    acting: game.actingSeat,
    actingSeats: game.actingSeats(),
    liveCount: wall.liveCount,
    doraIndicators: wall.doraIndicators,
    lastDiscard: game.getLastDiscard(),
    seats: SEATS.map((s) => {
      const p = game.getPlayer(s);
      const shown = visible.includes(s);
      return {
        seat: s,
        score: p.score,
        seatWind: p.seatWind,
        hand: shown ? p.hand.list : null,
        handCount: p.hand.size,
        drawn: shown ? p.drawn : null,
        hasDrawn: p.drawn !== null,
        melds: p.melds.slice(),
        discards: p.discards.map((d) => ({ ...d })),
        riichi: p.riichi,
        riichiDiscardIndex: p.riichiDiscardIndex,
      };
    }),
    outcome: game.handOutcome(),
  };
}
