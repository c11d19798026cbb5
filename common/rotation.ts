export interface RotationPosition {
  /** Seconds into the current cycle, in [0, cycle). */
  elapsed: number;
  index: number;
  /** Seconds left on the current item, in (0, itemDuration]. */
  remaining: number;
}

/** Modulo that stays in [0, divisor) for negative dividends. */
export function positiveModulo(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Maps a raw elapsed offset onto the rotation cycle (itemDuration × length).
 * An empty catalog has no cycle: everything is 0.
 */
export function rotationPosition(rawElapsed: number, itemDuration: number, length: number): RotationPosition {
  const cycle = itemDuration * length;
  if (!(cycle > 0)) {
    return { elapsed: 0, index: 0, remaining: 0 };
  }
  const elapsed = positiveModulo(rawElapsed, cycle);
  // floating point can land exactly on the cycle end for tiny negatives
  const index = Math.min(Math.floor(elapsed / itemDuration), length - 1);
  return { elapsed, index, remaining: itemDuration - (elapsed % itemDuration) };
}
