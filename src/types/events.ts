import { PoolId } from './common';

/**
 * Base shape of every controller notification.
 */
export interface FeeEngineEvent {
  /** Event type identifier string */
  type: string;
  /** Pool the event refers to */
  pool: PoolId;
  /** Unix timestamp in seconds when the event was emitted */
  timestamp: number;
}

/**
 * Emitted when the observable fee tuple of a pool changes.
 */
export interface FeeStateChangedEvent extends FeeEngineEvent {
  type: 'fee_state_changed';
  baseFeePpm: number;
  surgeFeePpm: number;
  inCap: boolean;
}

/**
 * Emitted instead of failing when a pool is initialized twice.
 */
export interface AlreadyInitializedEvent extends FeeEngineEvent {
  type: 'already_initialized';
}

export type AnyFeeEngineEvent = FeeStateChangedEvent | AlreadyInitializedEvent;

export type FeeEngineListener<E extends FeeEngineEvent> = (event: E) => void;
