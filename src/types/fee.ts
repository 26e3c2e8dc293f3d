/**
 * Unpacked controller state for one pool.
 */
export interface FeeStateFields {
  /** Decaying cap-event accumulator, scaled by freqScalingUnit * 1e6 per event */
  freq: bigint;
  /** Current base fee in parts-per-million */
  baseFeePpm: number;
  /** Timestamp of the last frequency decay */
  freqLastUpdate: number;
  /** Timestamp the current cap event began (0 = none) */
  capStart: number;
  /** Timestamp the base fee was last recomputed */
  lastFeeUpdate: number;
  /** True while a cap event is active */
  inCap: boolean;
}

/**
 * Fee pair returned by the read path.
 */
export interface FeeSnapshot {
  baseFeePpm: number;
  surgeFeePpm: number;
}

/**
 * Fee pair plus their capped sum.
 */
export interface FeeBreakdown extends FeeSnapshot {
  totalFeePpm: number;
}
