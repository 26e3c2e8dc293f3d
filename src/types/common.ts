/**
 * Opaque 32-byte pool key, normalised to 64 lowercase hex characters.
 */
export type PoolId = string;

/**
 * Tick-cap comparison granularity.
 *
 * - `step`: compare against the last recorded observation.
 * - `block`: compare against the tick standing at the start of the
 *   current time unit.
 */
export enum CapMode {
  STEP = 'step',
  BLOCK = 'block',
}

/**
 * Per-pool controller state as seen by callers.
 */
export enum PoolPhase {
  UNINITIALIZED = 'uninitialized',
  NORMAL = 'normal',
  CAPPED = 'capped',
}

/**
 * Credential carried by the single writer of pool state.
 *
 * `hook` must equal the configured authorized hook contract address.
 */
export interface HookCapability {
  hook: string;
}

/**
 * Source of "now" in unix seconds.
 */
export type Clock = () => number;

/**
 * Structured error payload, mirrors CapFeeError without the stack.
 */
export interface CapFeeErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Logger interface for engine instrumentation.
 *
 * Implement this interface to receive debug, info, and error logs from
 * the oracle, the fee controller and RPC reads.
 * Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for routine steps and RPC calls. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for state transitions. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for failed reads and rejected writes. */
  error(msg: string, err?: unknown): void;
}
