import type { Seat } from '../../game/Player';
import { SEATS } from '../../game/Player';
import type { LimitName, Payment, WinContext } from './context';
import { isDealerWin } from './context';

export const MANGAN_BASE = 2000;
export const YAKUMAN_BASE = 8000;

export const ceil100 = (points: number) => Math.ceil(points / 100) * 100;

export function limitFor(han: number): { name: LimitName; base: number } | null {
  if (han >= 13) return { name: 'kazoeYakuman', base: YAKUMAN_BASE };
  if (han >= 11) return { name: 'sanbaiman', base: 6000 };
  if (han >= 8) return { name: 'baiman', base: 4000 };
  if (han >= 6) return { name: 'haneman', base: 3000 };
  if (han >= 5) return { name: 'mangan', base: MANGAN_BASE };
  return null;
}

/** Base points and the limit name they reached, if any. */
export function basePoints(han: number, fu: number, yakuman: number): { base: number; limit: LimitName | null } {
  if (yakuman > 0) return { base: YAKUMAN_BASE * yakuman, limit: 'yakuman' };
  const limit = limitFor(han);
  if (limit) return { base: limit.base, limit: limit.name };
  const base = fu * Math.pow(2, han + 2);
  if (base >= MANGAN_BASE) return { base: MANGAN_BASE, limit: 'mangan' };
  return { base, limit: null };
}

/** Who pays the winner how much, honba included. */
export function payments(base: number, ctx: WinContext): Payment[] {
  const dealerWin = isDealerWin(ctx);
  if (ctx.winBy.type === 'ron') {
    const amount = ceil100(base * (dealerWin ? 6 : 4)) + 300 * ctx.honba;
    return [{ from: ctx.winBy.from, amount }];
  }
  const out: Payment[] = [];
  for (const s of SEATS) {
    if (s === ctx.winner) continue;
    const share = dealerWin || s === ctx.dealerSeat ? ceil100(base * 2) : ceil100(base);
    out.push({ from: s, amount: share + 100 * ctx.honba });
  }
  return out;
}

export function scoreChanges(winner: Seat, pays: readonly Payment[], stickBonus: number): [number, number, number, number] {
  const delta: [number, number, number, number] = [0, 0, 0, 0];
  for (const p of pays) {
    delta[p.from] -= p.amount;
    delta[winner] += p.amount;
  }
  delta[winner] += stickBonus;
  return delta;
}
