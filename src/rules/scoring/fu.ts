import { isTerminalOrHonor } from '../../domain/Tile';
import type { WinReading } from '../../domain/HandAnalyzer';
import type { WinContext } from './context';
import { isTsumo } from './context';
import { yakuhaiRoles } from './yaku';

export const SEVEN_PAIRS_FU = 25;

const roundUpToTens = (fu: number) => Math.ceil(fu / 10) * 10;

export function standardFu(reading: WinReading, opts: { menzen: boolean; pinfu: boolean; ctx: WinContext }): number {
  const { menzen, pinfu, ctx } = opts;
  const tsumo = isTsumo(ctx);
  if (pinfu && tsumo) return 20;

  let fu = 20;
  if (menzen && !tsumo) fu += 10;
  if (tsumo) fu += 2;

  for (const s of reading.form.sets) {
    if (s.kind === 'run') continue;
    let setFu = 2;
    if (isTerminalOrHonor(s.value)) setFu *= 2;
    if (!s.open) setFu *= 2;
    if (s.kind === 'quad') setFu *= 4;
    fu += setFu;
  }

  fu += 2 * yakuhaiRoles(reading.form.pair, ctx);

  if (reading.wait === 'kanchan' || reading.wait === 'penchan' || reading.wait === 'tanki') fu += 2;

  fu = roundUpToTens(fu);
  if (!menzen && fu < 30) fu = 30;
  return fu;
}
