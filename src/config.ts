import { CapMode, Clock, Logger } from './types/common';
import { PolicyParameters, PolicyProvider } from './types/policy';
import { TickSource } from './types/oracle';

/**
 * Supported Soroban networks for the pool-manager tick reader.
 */
export enum Network {
  TESTNET = 'testnet',
  MAINNET = 'mainnet',
}

/**
 * RPC endpoint per network deployment.
 */
export interface NetworkConfig {
  rpcUrl: string;
  networkPassphrase: string;
  sorobanTimeout: number;
}

/**
 * Engine configuration.
 */
export interface CapFeeConfig {
  /** Stellar contract address of the only hook allowed to write fee state */
  authorizedHook: string;
  /** Policy collaborator; built from policyDefaults when omitted */
  policy?: PolicyProvider;
  /** Overrides applied on top of DEFAULTS when no policy is given */
  policyDefaults?: Partial<PolicyParameters>;
  /** Ring size every pool's oracle is grown to on initialization */
  sampleCapacity?: number;
  /** Source of "now" in unix seconds */
  clock?: Clock;
  /** Optional logger for state transitions and RPC instrumentation. */
  logger?: Logger;
  /** Current-tick reader; built from the Soroban settings below when omitted */
  tickSource?: TickSource;
  /** Soroban network used by the built-in tick reader */
  network?: Network;
  /** Optional custom RPC URL */
  rpcUrl?: string;
  /** Pool-manager contract exposing get_tick / max_ticks_per_block */
  poolManagerAddress?: string;
  /** Maximum number of retry attempts for failed RPC calls */
  maxRetries?: number;
  /** Delay in milliseconds between retry attempts */
  retryDelayMs?: number;
  /** Maximum delay in milliseconds between retry attempts */
  maxRetryDelayMs?: number;
}

export const NETWORK_CONFIGS: Record<Network, NetworkConfig> = {
  [Network.TESTNET]: {
    rpcUrl: 'https://soroban-testnet.stellar.org',
    networkPassphrase: 'Test SDF Network ; September 2015',
    sorobanTimeout: 30,
  },
  [Network.MAINNET]: {
    rpcUrl: 'https://soroban.stellar.org',
    networkPassphrase: 'Public Global Stellar Network ; September 2015',
    sorobanTimeout: 30,
  },
};

/**
 * Default ring capacity of the observation buffer.
 */
export const SAMPLE_CAPACITY = 24;

/**
 * Global policy defaults, used when a pool has no override.
 */
export const DEFAULTS: Readonly<PolicyParameters> = {
  targetCapsPerDay: 4,
  capBudgetDecayWindowSeconds: 180 * 86_400,
  freqScalingUnit: 10n ** 18n,
  minBaseFeePpm: 100,
  maxBaseFeePpm: 50_000,
  maxStepPpm: 30_000,
  baseFeeUpdateIntervalSeconds: 86_400,
  surgeDecayPeriodSeconds: 3_600,
  surgeFeeMultiplierPpm: 3_000_000,
  maxAbsTickMove: 50,
  baseFeeFactorPpm: 28,
  defaultBaseFeePpm: 3_000,
  capMode: CapMode.STEP,
  blockDurationSeconds: 12,
};

/**
 * RPC retry defaults.
 */
export const RPC_DEFAULTS = {
  maxRetries: 3,
  retryDelayMs: 1000,
  maxRetryDelayMs: 10000,
} as const;

/**
 * Fixed-point constants.
 */
export const PRECISION = {
  PPM: 1_000_000n,
  SECONDS_PER_DAY: 86_400n,
  /** Highest total fee a pool may charge (100%) */
  MAX_FEE_PPM: 1_000_000,
} as const;

/**
 * Field widths of the packed fee-state word and the oracle types.
 */
export const WIDTHS = {
  FREQ: 96,
  BASE_FEE: 32,
  FREQ_LAST_UPDATE: 40,
  CAP_START: 40,
  LAST_FEE_UPDATE: 40,
  IN_CAP: 1,
  TIMESTAMP: 32,
  TICK: 24,
  CUMULATIVE: 56,
  CARDINALITY: 16,
} as const;
