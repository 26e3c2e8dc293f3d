export { CapFeeEngine, SwapOutcome } from './client';
export {
  CapFeeConfig,
  DEFAULTS,
  Network,
  NetworkConfig,
  NETWORK_CONFIGS,
  PRECISION,
  RPC_DEFAULTS,
  SAMPLE_CAPACITY,
  WIDTHS,
} from './config';
export * from './errors';
export { ErrorParser } from './errors/parser';
export { SorobanPoolManagerClient } from './contracts/pool-manager';

export { classify, timeUnitOf } from './modules/tick-cap';
export { ObservationStore } from './modules/oracle';
export {
  MAX_FREQ,
  clearCapEvent,
  decayFreq,
  initialFeeState,
  isUninitialized,
  packFeeState,
  recordCapEvent,
  unpackFeeState,
} from './modules/fee-state';
export { BaseFeeStep, capsPerDayPpm, deviationPpm, nextBaseFee, surgeFee } from './modules/surge';
export { FeeController, FeeControllerOptions, systemClock } from './modules/fees';
export { StaticPolicyProvider, validatePolicy } from './modules/policy';
export { FeeTracker, FeeTrackerOptions, TrackedSnapshot } from './modules/tracker';

export * from './types/common';
export * from './types/events';
export * from './types/fee';
export * from './types/oracle';
export * from './types/policy';

export { getPoolId, isValidContractId, normalizePoolId, truncateAddress } from './utils/addresses';
export { RetryOptions, withRetry } from './utils/retry';
