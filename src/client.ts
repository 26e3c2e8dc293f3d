import {
  CapFeeConfig,
  Network,
  NetworkConfig,
  NETWORK_CONFIGS,
  RPC_DEFAULTS,
  SAMPLE_CAPACITY,
} from './config';
import { SorobanPoolManagerClient } from './contracts/pool-manager';
import { ValidationError } from './errors';
import { FeeController, systemClock } from './modules/fees';
import { ObservationStore } from './modules/oracle';
import { StaticPolicyProvider } from './modules/policy';
import { FeeTracker } from './modules/tracker';
import { Clock, HookCapability, Logger, PoolId } from './types/common';
import { FeeBreakdown, FeeSnapshot } from './types/fee';
import { ObservationState, TickSource } from './types/oracle';
import { PolicyProvider } from './types/policy';
import { truncateAddress } from './utils/addresses';
import {
  validateContractAddress,
  validateNonNegativeInteger,
  validatePoolId,
  validateTick,
} from './utils/validation';

/**
 * Result of routing one swap through the engine.
 */
export interface SwapOutcome extends FeeSnapshot {
  /** Tick reported by the tick source */
  tick: number;
  /** Tick actually recorded by the oracle */
  truncatedTick: number;
  wasCapped: boolean;
}

/**
 * Main entry point of the fee engine.
 *
 * Wires a policy provider, the truncated-tick oracle and the fee
 * controller together, and reads current ticks from a pool-manager
 * contract (or any injected TickSource) before running the synchronous
 * core.
 */
export class CapFeeEngine {
  readonly config: CapFeeConfig;
  readonly network: Network;
  readonly networkConfig: NetworkConfig;
  readonly policy: PolicyProvider;
  readonly oracle: ObservationStore;
  readonly controller: FeeController;

  private readonly tickSource?: TickSource;
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private readonly sampleCapacity: number;
  private readonly trackers = new Map<PoolId, FeeTracker>();

  constructor(config: CapFeeConfig) {
    validateContractAddress(config.authorizedHook, 'authorizedHook');

    this.config = {
      sampleCapacity: SAMPLE_CAPACITY,
      maxRetries: RPC_DEFAULTS.maxRetries,
      retryDelayMs: RPC_DEFAULTS.retryDelayMs,
      maxRetryDelayMs: RPC_DEFAULTS.maxRetryDelayMs,
      ...config,
    };

    this.sampleCapacity = this.config.sampleCapacity ?? SAMPLE_CAPACITY;
    validateNonNegativeInteger(this.sampleCapacity, 'sampleCapacity');

    this.network = config.network ?? Network.TESTNET;
    this.networkConfig = {
      ...NETWORK_CONFIGS[this.network],
      ...(config.rpcUrl ? { rpcUrl: config.rpcUrl } : {}),
    };

    this.clock = config.clock ?? systemClock;
    this.logger = config.logger;
    this.policy = config.policy ?? new StaticPolicyProvider(config.policyDefaults);
    this.oracle = new ObservationStore(this.logger);
    this.controller = new FeeController({
      policy: this.policy,
      authorizedHook: config.authorizedHook,
      capacity: this.oracle,
      clock: this.clock,
      logger: this.logger,
    });

    if (config.tickSource) {
      this.tickSource = config.tickSource;
    } else if (config.poolManagerAddress) {
      validateContractAddress(config.poolManagerAddress, 'poolManagerAddress');
      this.tickSource = new SorobanPoolManagerClient(
        config.poolManagerAddress,
        this.networkConfig.rpcUrl,
        this.networkConfig.networkPassphrase,
        {
          maxRetries: this.config.maxRetries ?? RPC_DEFAULTS.maxRetries,
          baseDelayMs: this.config.retryDelayMs ?? RPC_DEFAULTS.retryDelayMs,
          maxDelayMs: this.config.maxRetryDelayMs ?? RPC_DEFAULTS.maxRetryDelayMs,
        },
        this.logger,
        this.networkConfig.sorobanTimeout,
      );
    }
  }

  /**
   * Enable the pool's oracle and create its fee state.
   *
   * Safe to call again: an enabled oracle is left alone and the controller
   * reports the repeat as a notice.
   *
   * @param tick - Starting tick; read from the tick source when omitted
   */
  async initializePool(pool: PoolId, tick?: number): Promise<FeeSnapshot> {
    const key = validatePoolId(pool);

    if (!this.oracle.isEnabled(key)) {
      const startTick = tick ?? (await this.readTick(key));
      const params = this.controller.parameters(key);
      this.oracle.initialize(key, this.clock(), startTick, params.maxAbsTickMove);
      this.oracle.grow(key, this.sampleCapacity);
    }

    return this.controller.initialize(key);
  }

  /**
   * Record the pool's post-swap tick and advance its fee controller.
   *
   * The capability, the fee state and the policy are checked before the
   * oracle is written, so a rejected swap leaves both components untouched.
   *
   * @param tick - Post-swap tick; read from the tick source when omitted
   */
  async onSwap(pool: PoolId, capability: HookCapability, tick?: number): Promise<SwapOutcome> {
    const key = validatePoolId(pool);
    const currentTick = tick ?? (await this.readTick(key));
    validateTick(currentTick);

    this.controller.authorize(capability);
    this.controller.getRawState(key);
    const params = this.controller.parameters(key);

    const write = this.oracle.write(
      key,
      this.clock(),
      currentTick,
      params.maxAbsTickMove,
      params.capMode,
      params.blockDurationSeconds,
    );
    const fees = this.controller.notifyStep(key, write.wasCapped, capability);

    this.logger?.debug('Swap processed', {
      pool: truncateAddress(key),
      tick: currentTick,
      truncatedTick: write.truncatedTick,
      wasCapped: write.wasCapped,
    });

    return {
      ...fees,
      tick: currentTick,
      truncatedTick: write.truncatedTick,
      wasCapped: write.wasCapped,
    };
  }

  getFeeState(pool: PoolId): FeeSnapshot {
    return this.controller.getFeeState(pool);
  }

  getTotalFee(pool: PoolId): FeeBreakdown {
    return this.controller.getTotalFee(pool);
  }

  isCapEventActive(pool: PoolId): boolean {
    return this.controller.isCapEventActive(pool);
  }

  /**
   * Cumulative truncated tick at each `now - secondsAgo`.
   */
  observe(pool: PoolId, secondsAgos: number[]): bigint[] {
    return this.oracle.observe(pool, secondsAgos, this.clock());
  }

  /**
   * Time-weighted mean truncated tick over the last `secondsAgo` seconds.
   */
  consult(pool: PoolId, secondsAgo: number): number {
    return this.oracle.consult(pool, secondsAgo, this.clock());
  }

  getObservationState(pool: PoolId): ObservationState {
    return this.oracle.getObservationState(pool);
  }

  /**
   * Fee tracker for a pool (singleton per pool).
   */
  tracker(pool: PoolId, historySize?: number): FeeTracker {
    const key = validatePoolId(pool);
    let tracker = this.trackers.get(key);
    if (!tracker) {
      tracker = new FeeTracker(this.controller, key, {
        logger: this.logger,
        clock: this.clock,
        historySize,
      });
      this.trackers.set(key, tracker);
    }
    return tracker;
  }

  private async readTick(pool: PoolId): Promise<number> {
    if (!this.tickSource) {
      throw new ValidationError('No tick source configured: pass a tick or set tickSource/poolManagerAddress', {
        pool,
      });
    }
    return this.tickSource.getCurrentTick(pool);
  }
}
