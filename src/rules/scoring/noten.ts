export const NOTEN_POOL = 3000;

/** Exhaustive-draw transfers: noten seats split 3000 to the tenpai seats. */
export function notenPayments(tenpai: readonly [boolean, boolean, boolean, boolean]): [number, number, number, number] {
  const ready = tenpai.filter(Boolean).length;
  if (ready === 0 || ready === 4) return [0, 0, 0, 0];
  const gain = NOTEN_POOL / ready;
  const loss = NOTEN_POOL / (4 - ready);
  return [
    tenpai[0] ? gain : -loss,
    tenpai[1] ? gain : -loss,
    tenpai[2] ? gain : -loss,
    tenpai[3] ? gain : -loss,
  ];
}
