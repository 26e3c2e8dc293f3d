import { PRECISION } from "../config";
import {
  NotInitializedError,
  OutOfOrderError,
  UnauthorizedError,
} from "../errors";
import { Clock, HookCapability, Logger, PoolId, PoolPhase } from "../types/common";
import {
  AlreadyInitializedEvent,
  FeeEngineListener,
  FeeEngineEvent,
  FeeStateChangedEvent,
} from "../types/events";
import { FeeBreakdown, FeeSnapshot, FeeStateFields } from "../types/fee";
import { CapacitySignal } from "../types/oracle";
import { PolicyParameters, PolicyProvider } from "../types/policy";
import { truncateAddress } from "../utils/addresses";
import {
  validateContractAddress,
  validatePoolId,
  validateTimestamp,
} from "../utils/validation";
import {
  clearCapEvent,
  decayFreq,
  initialFeeState,
  isUninitialized,
  packFeeState,
  recordCapEvent,
  stampFeeUpdate,
  stampFreqUpdate,
  unpackFeeState,
  withBaseFee,
} from "./fee-state";
import { validatePolicy } from "./policy";
import { nextBaseFee, surgeFee } from "./surge";

export interface FeeControllerOptions {
  policy: PolicyProvider;
  /** Contract address of the only hook allowed to call notifyStep */
  authorizedHook: string;
  /** Seeds the base fee on initialization */
  capacity?: CapacitySignal;
  clock?: Clock;
  logger?: Logger;
}

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Per-pool adaptive fee controller.
 *
 * Each pool's state lives in one packed word that is replaced wholesale
 * on every write, so readers never observe a partial update. Only the
 * holder of the authorized hook capability may write.
 */
export class FeeController {
  private readonly states = new Map<PoolId, bigint>();
  private readonly policy: PolicyProvider;
  private readonly capacity?: CapacitySignal;
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private readonly changeListeners = new Set<FeeEngineListener<FeeStateChangedEvent>>();
  private readonly noticeListeners = new Set<FeeEngineListener<AlreadyInitializedEvent>>();
  private authorizedHook: string;

  constructor(options: FeeControllerOptions) {
    validateContractAddress(options.authorizedHook, "authorizedHook");
    this.policy = options.policy;
    this.authorizedHook = options.authorizedHook;
    this.capacity = options.capacity;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  /**
   * Create the pool's fee state.
   *
   * Repeat calls are not an error: they emit an `already_initialized`
   * notice and return the current fees.
   */
  initialize(pool: PoolId): FeeSnapshot {
    const key = validatePoolId(pool);
    const now = this.now();

    if (!isUninitialized(this.word(key))) {
      this.logger?.info("Fee state already initialized", { pool: key });
      this.emit(this.noticeListeners, { type: "already_initialized", pool: key, timestamp: now });
      return this.getFeeState(key);
    }

    const params = this.parameters(key);
    const maxTicksPerBlock = this.capacity?.getMaxTicksPerBlock(key);
    const seed =
      maxTicksPerBlock !== undefined && maxTicksPerBlock > 0
        ? maxTicksPerBlock * params.baseFeeFactorPpm
        : params.defaultBaseFeePpm;

    const fields = withBaseFee(
      initialFeeState(0, now),
      seed,
      params.minBaseFeePpm,
      params.maxBaseFeePpm,
    );
    this.states.set(key, packFeeState(fields));

    this.logger?.info("Fee state initialized", {
      pool: key,
      baseFeePpm: fields.baseFeePpm,
      maxTicksPerBlock,
    });
    return { baseFeePpm: fields.baseFeePpm, surgeFeePpm: 0 };
  }

  /**
   * Advance a pool's controller by one step.
   *
   * Decays the cap frequency, registers a cap event when `wasCapped`,
   * clears the cap once the surge has fully decayed, and recomputes the
   * base fee when the update interval has passed. Nothing is committed if
   * any check fails.
   *
   * @throws {UnauthorizedError} If the capability is not the authorized hook
   * @throws {NotInitializedError} If the pool has no fee state
   * @throws {OutOfOrderError} If the clock is behind the last update
   */
  notifyStep(pool: PoolId, wasCapped: boolean, capability: HookCapability): FeeSnapshot {
    this.authorize(capability);
    const key = validatePoolId(pool);
    const before = this.load(key);
    const now = this.now();

    if (now < before.freqLastUpdate) {
      throw new OutOfOrderError(now, before.freqLastUpdate);
    }

    const params = this.parameters(key);
    const surgeBefore = this.surgeOf(before, now, params);

    let next = decayFreq(before, now, params.capBudgetDecayWindowSeconds);

    if (wasCapped) {
      next = recordCapEvent(next, now, params.freqScalingUnit * PRECISION.PPM);
    } else if (next.inCap && this.surgeOf(next, now, params) === 0) {
      next = clearCapEvent(next);
    }

    if (now - next.lastFeeUpdate >= params.baseFeeUpdateIntervalSeconds) {
      const step = nextBaseFee(next.baseFeePpm, next.freq, params);
      if (step.adjusted) {
        this.logger?.debug("Base fee adjusted", {
          pool: key,
          from: next.baseFeePpm,
          to: step.baseFeePpm,
          deviationPpm: step.deviationPpm.toString(),
        });
      }
      next = stampFeeUpdate({ ...next, baseFeePpm: step.baseFeePpm }, now);
    }

    next = stampFreqUpdate(
      withBaseFee(next, next.baseFeePpm, params.minBaseFeePpm, params.maxBaseFeePpm),
      now,
    );
    this.states.set(key, packFeeState(next));

    const surgeAfter = this.surgeOf(next, now, params);
    if (!before.inCap && next.inCap) {
      this.logger?.info("Cap event started", { pool: truncateAddress(key), surgeFeePpm: surgeAfter });
    } else if (before.inCap && !next.inCap) {
      this.logger?.info("Cap event ended", { pool: truncateAddress(key) });
    }

    if (
      before.baseFeePpm !== next.baseFeePpm ||
      surgeBefore !== surgeAfter ||
      before.inCap !== next.inCap
    ) {
      this.emit(this.changeListeners, {
        type: "fee_state_changed",
        pool: key,
        baseFeePpm: next.baseFeePpm,
        surgeFeePpm: surgeAfter,
        inCap: next.inCap,
        timestamp: now,
      });
    }

    return { baseFeePpm: next.baseFeePpm, surgeFeePpm: surgeAfter };
  }

  /**
   * Current base and surge fee.
   *
   * @throws {NotInitializedError} If the pool has no fee state
   */
  getFeeState(pool: PoolId): FeeSnapshot {
    const key = validatePoolId(pool);
    const state = this.load(key);
    const params = this.policy.getParameters(key);
    return {
      baseFeePpm: state.baseFeePpm,
      surgeFeePpm: this.surgeOf(state, this.clock(), params),
    };
  }

  /**
   * Base plus surge, capped at 100%.
   */
  getTotalFee(pool: PoolId): FeeBreakdown {
    const fees = this.getFeeState(pool);
    return {
      ...fees,
      totalFeePpm: Math.min(fees.baseFeePpm + fees.surgeFeePpm, PRECISION.MAX_FEE_PPM),
    };
  }

  isCapEventActive(pool: PoolId): boolean {
    const word = this.word(validatePoolId(pool));
    return !isUninitialized(word) && unpackFeeState(word).inCap;
  }

  isInitialized(pool: PoolId): boolean {
    return !isUninitialized(this.word(validatePoolId(pool)));
  }

  getPhase(pool: PoolId): PoolPhase {
    const word = this.word(validatePoolId(pool));
    if (isUninitialized(word)) return PoolPhase.UNINITIALIZED;
    return unpackFeeState(word).inCap ? PoolPhase.CAPPED : PoolPhase.NORMAL;
  }

  /**
   * Unpacked controller fields, for inspection.
   *
   * @throws {NotInitializedError} If the pool has no fee state
   */
  getRawState(pool: PoolId): FeeStateFields {
    return this.load(validatePoolId(pool));
  }

  getAuthorizedHook(): string {
    return this.authorizedHook;
  }

  /**
   * Hand writer rights to another hook contract.
   *
   * @throws {UnauthorizedError} If the capability is not the current hook
   */
  setAuthorizedHook(capability: HookCapability, newHook: string): void {
    this.authorize(capability);
    validateContractAddress(newHook, "newHook");
    this.logger?.info("Authorized hook rotated", {
      from: truncateAddress(this.authorizedHook),
      to: truncateAddress(newHook),
    });
    this.authorizedHook = newHook;
  }

  onFeeStateChanged(listener: FeeEngineListener<FeeStateChangedEvent>): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  onAlreadyInitialized(listener: FeeEngineListener<AlreadyInitializedEvent>): () => void {
    this.noticeListeners.add(listener);
    return () => {
      this.noticeListeners.delete(listener);
    };
  }

  /**
   * @throws {UnauthorizedError} If the capability is not the authorized hook
   */
  authorize(capability: HookCapability): void {
    if (capability.hook !== this.authorizedHook) {
      this.logger?.error("Rejected unauthorized writer", { caller: capability.hook });
      throw new UnauthorizedError(capability.hook);
    }
  }

  private word(pool: PoolId): bigint {
    return this.states.get(pool) ?? 0n;
  }

  private load(pool: PoolId): FeeStateFields {
    const word = this.word(pool);
    if (isUninitialized(word)) {
      throw new NotInitializedError(pool);
    }
    return unpackFeeState(word);
  }

  private now(): number {
    const now = this.clock();
    validateTimestamp(now, "now");
    return now;
  }

  /**
   * Resolved and validated policy for a pool.
   *
   * @throws {ParameterOutOfRangeError} If the resolved parameters are invalid
   */
  parameters(pool: PoolId): PolicyParameters {
    const params = this.policy.getParameters(pool);
    validatePolicy(params);
    return params;
  }

  private surgeOf(state: FeeStateFields, now: number, params: PolicyParameters): number {
    return surgeFee(
      now,
      state.capStart,
      params.surgeDecayPeriodSeconds,
      state.baseFeePpm,
      params.surgeFeeMultiplierPpm,
    );
  }

  private emit<E extends FeeEngineEvent>(listeners: Set<FeeEngineListener<E>>, event: E): void {
    // Runs after the commit; listener failures are logged only.
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err: unknown) {
        this.logger?.error(`Listener for ${event.type} failed`, {
          pool: event.pool,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
