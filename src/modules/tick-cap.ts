import { TickCapResult } from "../types/oracle";
import { validateNonNegativeInteger, validateTick } from "../utils/validation";

/**
 * Clamp a proposed tick movement to the pool's maximum absolute move.
 *
 * The guard does not know about capping granularity; callers pass the
 * reference tick for the mode they use (see ObservationStore.referenceTick).
 *
 * @example
 * classify(100, 180, 50); // { truncatedTick: 150, wasCapped: true }
 * classify(100, 130, 50); // { truncatedTick: 130, wasCapped: false }
 */
export function classify(
  previousTick: number,
  currentTick: number,
  maxAbsTickMove: number,
): TickCapResult {
  validateTick(previousTick, "previousTick");
  validateTick(currentTick, "currentTick");
  validateNonNegativeInteger(maxAbsTickMove, "maxAbsTickMove");

  const delta = currentTick - previousTick;
  if (Math.abs(delta) <= maxAbsTickMove) {
    return { truncatedTick: currentTick, wasCapped: false };
  }

  return {
    truncatedTick: previousTick + Math.sign(delta) * maxAbsTickMove,
    wasCapped: true,
  };
}

/**
 * Index of the discrete time unit a timestamp falls in, for block mode.
 */
export function timeUnitOf(timestamp: number, blockDurationSeconds: number): number {
  return Math.floor(timestamp / blockDurationSeconds);
}
