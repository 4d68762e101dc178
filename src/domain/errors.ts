/**
 * Engine bug, not a rule outcome: a tile went missing, a hand has the wrong
 * size, or a phase was entered with state it cannot have.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export function invariant(cond: unknown, message: string): asserts cond {
  if (!cond) throw new InvariantViolation(message);
}
