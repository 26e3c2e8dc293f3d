import { DEFAULTS, WIDTHS } from "../config";
import {
  AlreadyEnabledError,
  NotEnabledError,
  OutOfOrderError,
  ParameterOutOfRangeError,
  StaleLookbackError,
  ValidationError,
} from "../errors";
import { CapMode, Logger, PoolId } from "../types/common";
import {
  CapacitySignal,
  GrowResult,
  Observation,
  ObservationState,
  ObservationWriteResult,
} from "../types/oracle";
import { Rounding, divide, maxUint, saturatingAddSigned, toSafeNumber } from "../utils/math";
import {
  validateNonNegativeInteger,
  validatePoolId,
  validateTick,
  validateTimestamp,
} from "../utils/validation";
import { classify, timeUnitOf } from "./tick-cap";

interface BlockReference {
  unit: number;
  tick: number;
}

interface PoolOracle {
  observations: Array<Observation | undefined>;
  state: ObservationState;
  /** Cap applied by the most recent initialize/write */
  maxTicksPerBlock: number;
  blockRef?: BlockReference;
}

const MAX_CARDINALITY = toSafeNumber(maxUint(WIDTHS.CARDINALITY));

/**
 * Per-pool ring buffer of truncated tick observations.
 *
 * Each write clamps the tick movement against a reference tick before
 * recording it, so the cumulative series is a "truncated" time-weighted
 * tick. Reads never mutate.
 */
export class ObservationStore implements CapacitySignal {
  private readonly pools = new Map<PoolId, PoolOracle>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Enable the oracle for a pool and seed its first observation.
   *
   * @param maxAbsTickMove - Cap reported by the capacity signal until the first write
   * @throws {AlreadyEnabledError} If the pool's oracle is already enabled
   */
  initialize(
    pool: PoolId,
    startTimestamp: number,
    startTick: number,
    maxAbsTickMove: number = DEFAULTS.maxAbsTickMove,
  ): ObservationState {
    const key = validatePoolId(pool);
    validateTimestamp(startTimestamp, "startTimestamp");
    validateTick(startTick, "startTick");
    validateNonNegativeInteger(maxAbsTickMove, "maxAbsTickMove");

    if (this.pools.has(key)) {
      throw new AlreadyEnabledError(key);
    }

    const entry: PoolOracle = {
      observations: [
        { timestamp: startTimestamp, tick: startTick, truncatedCumulativeTick: 0n },
      ],
      state: { index: 0, cardinality: 1, cardinalityNext: 1 },
      maxTicksPerBlock: maxAbsTickMove,
    };
    this.pools.set(key, entry);

    this.logger?.info("Oracle enabled", { pool: key, startTimestamp, startTick });
    return { ...entry.state };
  }

  isEnabled(pool: PoolId): boolean {
    return this.pools.has(validatePoolId(pool));
  }

  /**
   * Record a tick for a pool, truncated against the reference tick.
   *
   * A second write at the same timestamp records nothing but still
   * reports whether the movement would have been capped.
   *
   * @throws {NotEnabledError} If the oracle is not enabled for the pool
   * @throws {OutOfOrderError} If the timestamp precedes the last observation
   */
  write(
    pool: PoolId,
    timestamp: number,
    tick: number,
    maxAbsTickMove: number,
    mode: CapMode = CapMode.STEP,
    blockDurationSeconds: number = DEFAULTS.blockDurationSeconds,
  ): ObservationWriteResult {
    const key = validatePoolId(pool);
    validateTimestamp(timestamp);
    validateTick(tick);
    validateNonNegativeInteger(maxAbsTickMove, "maxAbsTickMove");
    const entry = this.require(key);
    const last = this.latest(entry);

    if (timestamp < last.timestamp) {
      throw new OutOfOrderError(timestamp, last.timestamp);
    }

    const reference = this.resolveReference(entry, last, timestamp, mode, blockDurationSeconds);
    const { truncatedTick, wasCapped } = classify(reference, tick, maxAbsTickMove);

    if (timestamp === last.timestamp) {
      return { state: { ...entry.state }, truncatedTick, wasCapped, recorded: false };
    }

    const { index, cardinality, cardinalityNext } = entry.state;
    const cardinalityUpdated =
      cardinalityNext > cardinality && index === cardinality - 1
        ? cardinalityNext
        : cardinality;
    const indexUpdated = (index + 1) % cardinalityUpdated;

    const elapsed = BigInt(timestamp - last.timestamp);
    entry.observations[indexUpdated] = {
      timestamp,
      tick: truncatedTick,
      truncatedCumulativeTick: saturatingAddSigned(
        last.truncatedCumulativeTick,
        BigInt(truncatedTick) * elapsed,
        WIDTHS.CUMULATIVE,
      ),
    };
    entry.state = { index: indexUpdated, cardinality: cardinalityUpdated, cardinalityNext };
    entry.maxTicksPerBlock = maxAbsTickMove;

    if (mode === CapMode.BLOCK) {
      entry.blockRef = { unit: timeUnitOf(timestamp, blockDurationSeconds), tick: reference };
    }

    if (wasCapped) {
      this.logger?.debug("Tick movement truncated", {
        pool: key,
        reference,
        tick,
        truncatedTick,
      });
    }

    return { state: { ...entry.state }, truncatedTick, wasCapped, recorded: true };
  }

  /**
   * Raise the ring capacity. Requests at or below the current target are no-ops.
   *
   * @throws {NotEnabledError} If the oracle is not enabled for the pool
   * @throws {ParameterOutOfRangeError} If the capacity exceeds uint16
   */
  grow(pool: PoolId, cardinalityNext: number): GrowResult {
    const key = validatePoolId(pool);
    validateNonNegativeInteger(cardinalityNext, "cardinalityNext");
    const entry = this.require(key);

    if (cardinalityNext > MAX_CARDINALITY) {
      throw new ParameterOutOfRangeError(
        "cardinalityNext",
        cardinalityNext,
        `must not exceed ${MAX_CARDINALITY}`,
      );
    }

    const old = entry.state.cardinalityNext;
    if (cardinalityNext <= old) {
      return { old, new: old };
    }

    entry.observations.length = cardinalityNext;
    entry.state = { ...entry.state, cardinalityNext };
    this.logger?.debug("Oracle capacity grown", { pool: key, old, new: cardinalityNext });
    return { old, new: cardinalityNext };
  }

  /**
   * Cumulative truncated tick at each `now - secondsAgo`.
   *
   * @throws {StaleLookbackError} If a target predates the oldest retained observation
   */
  observe(pool: PoolId, secondsAgos: number[], now: number): bigint[] {
    const key = validatePoolId(pool);
    validateTimestamp(now, "now");
    const entry = this.require(key);
    return secondsAgos.map((secondsAgo) => this.observeSingle(entry, now, secondsAgo));
  }

  /**
   * Time-weighted mean truncated tick over the last `secondsAgo` seconds,
   * rounded toward negative infinity.
   */
  consult(pool: PoolId, secondsAgo: number, now: number): number {
    if (!Number.isInteger(secondsAgo) || secondsAgo <= 0) {
      throw new ValidationError("secondsAgo must be a positive integer", { secondsAgo });
    }
    const [start, end] = this.observe(pool, [secondsAgo, 0], now);
    return toSafeNumber(divide(end - start, BigInt(secondsAgo), Rounding.ROUND_FLOOR));
  }

  /**
   * Reference tick a write at `timestamp` would be classified against.
   *
   * In block mode the first write of a time unit pins the reference to the
   * latest recorded tick; later writes in the same unit reuse it.
   */
  referenceTick(
    pool: PoolId,
    timestamp: number,
    mode: CapMode = CapMode.STEP,
    blockDurationSeconds: number = DEFAULTS.blockDurationSeconds,
  ): number {
    const key = validatePoolId(pool);
    validateTimestamp(timestamp);
    const entry = this.require(key);
    return this.resolveReference(entry, this.latest(entry), timestamp, mode, blockDurationSeconds);
  }

  getObservationState(pool: PoolId): ObservationState {
    const entry = this.pools.get(validatePoolId(pool));
    return entry ? { ...entry.state } : { index: 0, cardinality: 0, cardinalityNext: 0 };
  }

  getLatestObservation(pool: PoolId): Observation | undefined {
    const entry = this.pools.get(validatePoolId(pool));
    return entry ? { ...this.latest(entry) } : undefined;
  }

  getMaxTicksPerBlock(pool: PoolId): number | undefined {
    return this.pools.get(validatePoolId(pool))?.maxTicksPerBlock;
  }

  private require(pool: PoolId): PoolOracle {
    const entry = this.pools.get(pool);
    if (!entry) {
      throw new NotEnabledError(pool);
    }
    return entry;
  }

  private latest(entry: PoolOracle): Observation {
    return this.at(entry, entry.state.index);
  }

  private at(entry: PoolOracle, index: number): Observation {
    const observation = entry.observations[index];
    if (!observation) {
      throw new RangeError(`Observation slot ${index} is empty`);
    }
    return observation;
  }

  private resolveReference(
    entry: PoolOracle,
    last: Observation,
    timestamp: number,
    mode: CapMode,
    blockDurationSeconds: number,
  ): number {
    if (mode === CapMode.STEP) {
      return last.tick;
    }
    if (!Number.isInteger(blockDurationSeconds) || blockDurationSeconds <= 0) {
      throw new ParameterOutOfRangeError(
        "blockDurationSeconds",
        blockDurationSeconds,
        "must be a positive integer in block mode",
      );
    }
    const unit = timeUnitOf(timestamp, blockDurationSeconds);
    return entry.blockRef?.unit === unit ? entry.blockRef.tick : last.tick;
  }

  private observeSingle(entry: PoolOracle, now: number, secondsAgo: number): bigint {
    validateNonNegativeInteger(secondsAgo, "secondsAgo");
    if (secondsAgo > now) {
      throw new ValidationError("secondsAgo must not reach before the epoch", {
        secondsAgo,
        now,
      });
    }

    const target = now - secondsAgo;
    const newest = this.latest(entry);

    if (target >= newest.timestamp) {
      return saturatingAddSigned(
        newest.truncatedCumulativeTick,
        BigInt(newest.tick) * BigInt(target - newest.timestamp),
        WIDTHS.CUMULATIVE,
      );
    }

    const { index, cardinality } = entry.state;
    const oldestIndex = entry.observations[(index + 1) % cardinality]
      ? (index + 1) % cardinality
      : 0;
    const oldest = this.at(entry, oldestIndex);

    if (target < oldest.timestamp) {
      throw new StaleLookbackError(target, oldest.timestamp);
    }
    if (target === oldest.timestamp) {
      return oldest.truncatedCumulativeTick;
    }

    const [before, after] = this.bracket(entry, target);
    if (target === before.timestamp) return before.truncatedCumulativeTick;
    if (target === after.timestamp) return after.truncatedCumulativeTick;

    const observationDelta = BigInt(after.timestamp - before.timestamp);
    const targetDelta = BigInt(target - before.timestamp);
    return (
      before.truncatedCumulativeTick +
      ((after.truncatedCumulativeTick - before.truncatedCumulativeTick) / observationDelta) *
        targetDelta
    );
  }

  /**
   * Binary search for the observations at or around `target`.
   *
   * Caller guarantees oldest.timestamp < target < newest.timestamp.
   */
  private bracket(entry: PoolOracle, target: number): [Observation, Observation] {
    const { index, cardinality } = entry.state;
    let l = (index + 1) % cardinality;
    let r = l + cardinality - 1;

    while (l <= r) {
      const i = Math.floor((l + r) / 2);
      const before = entry.observations[i % cardinality];

      if (!before) {
        l = i + 1;
        continue;
      }

      if (before.timestamp > target) {
        r = i - 1;
        continue;
      }

      const after = this.at(entry, (i + 1) % cardinality);
      if (target <= after.timestamp) {
        return [before, after];
      }
      l = i + 1;
    }

    throw new RangeError(`No observations bracket target ${target}`);
  }
}
