import { PRECISION } from "../config";
import { ParameterOutOfRangeError } from "../errors";
import { PolicyParameters } from "../types/policy";
import { absBigInt, clamp, clampBigInt, maxBigInt, toSafeNumber } from "../utils/math";

/**
 * Surge premium for a pool, decaying linearly from
 * `baseFeePpm * multiplierPpm / 1e6` at `capStart` to zero at
 * `capStart + decaySeconds`.
 *
 * @example
 * surgeFee(1800, 0, 3600, 5000, 3_000_000); // 0 (no cap event)
 * surgeFee(1800, 1, 3600, 5000, 3_000_000); // 7504
 */
export function surgeFee(
  now: number,
  capStart: number,
  decaySeconds: number,
  baseFeePpm: number,
  multiplierPpm: number,
): number {
  if (capStart === 0 || decaySeconds <= 0) {
    return 0;
  }
  const elapsed = Math.max(0, now - capStart);
  if (elapsed >= decaySeconds) {
    return 0;
  }

  const maxSurge = (BigInt(baseFeePpm) * BigInt(multiplierPpm)) / PRECISION.PPM;
  const remaining = BigInt(decaySeconds - elapsed);
  return toSafeNumber((maxSurge * remaining) / BigInt(decaySeconds));
}

/**
 * Estimated cap events per day, scaled by 1e6.
 */
export function capsPerDayPpm(
  freq: bigint,
  freqScalingUnit: bigint,
  decayWindowSeconds: number,
): bigint {
  if (decayWindowSeconds <= 0 || freqScalingUnit <= 0n) {
    return 0n;
  }
  return (freq * PRECISION.SECONDS_PER_DAY) / (freqScalingUnit * BigInt(decayWindowSeconds));
}

/**
 * Signed relative deviation of the observed cap rate from target, in ppm.
 *
 * @throws {ParameterOutOfRangeError} If targetCapsPerDay is not a positive integer
 */
export function deviationPpm(capsPerDay: bigint, targetCapsPerDay: number): bigint {
  if (!Number.isInteger(targetCapsPerDay) || targetCapsPerDay <= 0) {
    throw new ParameterOutOfRangeError("targetCapsPerDay", targetCapsPerDay, "must be a positive integer");
  }
  return capsPerDay / BigInt(targetCapsPerDay) - PRECISION.PPM;
}

export interface BaseFeeStep {
  baseFeePpm: number;
  deviationPpm: bigint;
  /** False when the deviation fell inside the dead-band */
  adjusted: boolean;
}

type FeedbackPolicy = Pick<
  PolicyParameters,
  | "targetCapsPerDay"
  | "capBudgetDecayWindowSeconds"
  | "freqScalingUnit"
  | "minBaseFeePpm"
  | "maxBaseFeePpm"
  | "maxStepPpm"
>;

/**
 * One step of the dead-banded, rate-limited proportional controller.
 *
 * Deviations smaller than maxStepPpm leave the fee untouched; larger ones
 * move it by at most `max(1, base * maxStepPpm / 1e6)` before clamping to
 * the pool's bounds.
 */
export function nextBaseFee(
  baseFeePpm: number,
  freq: bigint,
  policy: FeedbackPolicy,
): BaseFeeStep {
  const deviation = deviationPpm(
    capsPerDayPpm(freq, policy.freqScalingUnit, policy.capBudgetDecayWindowSeconds),
    policy.targetCapsPerDay,
  );

  const maxStep = BigInt(policy.maxStepPpm);
  if (absBigInt(deviation) < maxStep) {
    return { baseFeePpm, deviationPpm: deviation, adjusted: false };
  }

  const base = BigInt(baseFeePpm);
  const stepCap = maxBigInt(1n, (base * maxStep) / PRECISION.PPM);
  const rawStep = (base * deviation) / PRECISION.PPM;
  const step = clampBigInt(rawStep, -stepCap, stepCap);

  const next = clamp(
    toSafeNumber(base + step),
    policy.minBaseFeePpm,
    policy.maxBaseFeePpm,
  );
  return { baseFeePpm: next, deviationPpm: deviation, adjusted: true };
}
