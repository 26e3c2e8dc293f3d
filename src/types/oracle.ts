import { PoolId } from './common';

/**
 * A single recorded tick sample.
 */
export interface Observation {
  /** Unix timestamp (uint32) of the sample */
  timestamp: number;
  /** Truncated tick (int24) recorded at this timestamp */
  tick: number;
  /** Running sum of truncatedTick * secondsElapsed (int56) */
  truncatedCumulativeTick: bigint;
}

/**
 * Ring-buffer bookkeeping for a pool.
 */
export interface ObservationState {
  /** Slot of the most recent observation */
  index: number;
  /** Number of slots in the active ring; 0 means not enabled */
  cardinality: number;
  /** Ring size to switch to once the write index wraps */
  cardinalityNext: number;
}

/**
 * Outcome of classifying a proposed tick movement.
 */
export interface TickCapResult {
  /** Tick after clamping to the allowed movement */
  truncatedTick: number;
  /** True if the real movement exceeded the cap */
  wasCapped: boolean;
}

/**
 * Outcome of an oracle write.
 */
export interface ObservationWriteResult extends TickCapResult {
  state: ObservationState;
  /** False when an observation already existed for the timestamp */
  recorded: boolean;
}

/**
 * Result of growing the ring buffer.
 */
export interface GrowResult {
  old: number;
  new: number;
}

/**
 * Async accessor for a pool's current price tick.
 */
export interface TickSource {
  getCurrentTick(pool: PoolId): Promise<number>;
}

/**
 * Accessor for a pool's per-block tick capacity.
 *
 * Returns undefined while no data exists for the pool.
 */
export interface CapacitySignal {
  getMaxTicksPerBlock(pool: PoolId): number | undefined;
}
