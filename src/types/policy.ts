import { CapMode, PoolId } from './common';

/**
 * Numeric policy inputs for one pool.
 */
export interface PolicyParameters {
  /** Desired number of cap events per day */
  targetCapsPerDay: number;
  /** Window over which the frequency accumulator decays to zero */
  capBudgetDecayWindowSeconds: number;
  /** Fixed-point scale of the frequency accumulator */
  freqScalingUnit: bigint;
  /** Lower bound of the base fee in ppm */
  minBaseFeePpm: number;
  /** Upper bound of the base fee in ppm */
  maxBaseFeePpm: number;
  /** Largest relative base-fee move per update, also the dead-band width */
  maxStepPpm: number;
  /** Minimum spacing between base-fee recomputations */
  baseFeeUpdateIntervalSeconds: number;
  /** Time for the surge fee to decay linearly to zero */
  surgeDecayPeriodSeconds: number;
  /** Peak surge as a multiple of the base fee, in ppm */
  surgeFeeMultiplierPpm: number;
  /** Largest tick movement recorded per step before truncation */
  maxAbsTickMove: number;
  /** Seed multiplier applied to the capacity signal on initialization */
  baseFeeFactorPpm: number;
  /** Seed base fee when the capacity signal has no data */
  defaultBaseFeePpm: number;
  /** Reference-tick granularity for the cap guard */
  capMode: CapMode;
  /** Length of one time unit in block mode */
  blockDurationSeconds: number;
}

/**
 * Read-only policy collaborator.
 */
export interface PolicyProvider {
  getParameters(pool: PoolId): PolicyParameters;
}
