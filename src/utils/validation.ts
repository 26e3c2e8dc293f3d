import { ValidationError } from "../errors";
import { WIDTHS } from "../config";
import { fitsInt, fitsUint } from "./math";
import { isValidContractId, normalizePoolId } from "./addresses";
import { PoolId } from "../types/common";

/**
 * Validate and normalise a pool identifier.
 *
 * @returns The 64-char lowercase hex form used as the state key
 * @throws {ValidationError} If the value is not a 32-byte hex key
 */
export function validatePoolId(pool: string, fieldName: string = "pool"): PoolId {
  const normalized = normalizePoolId(pool);
  if (normalized === null) {
    throw new ValidationError(`Invalid ${fieldName}: expected 32-byte hex key`, {
      [fieldName]: pool,
    });
  }
  return normalized;
}

/**
 * Validate a Soroban contract address (C...).
 */
export function validateContractAddress(address: string, fieldName: string): void {
  if (!isValidContractId(address)) {
    throw new ValidationError(`Invalid ${fieldName}: expected contract address`, {
      [fieldName]: address,
    });
  }
}

/**
 * Validate a positive uint32 unix timestamp.
 */
export function validateTimestamp(timestamp: number, fieldName: string = "timestamp"): void {
  if (
    !Number.isInteger(timestamp) ||
    timestamp <= 0 ||
    !fitsUint(timestamp, WIDTHS.TIMESTAMP)
  ) {
    throw new ValidationError(`${fieldName} must be a positive uint32 integer`, {
      [fieldName]: timestamp,
    });
  }
}

/**
 * Validate an int24 tick.
 */
export function validateTick(tick: number, fieldName: string = "tick"): void {
  if (!Number.isInteger(tick) || !fitsInt(tick, WIDTHS.TICK)) {
    throw new ValidationError(`${fieldName} must be an int24 integer`, {
      [fieldName]: tick,
    });
  }
}

export function validateNonNegativeInteger(value: number, fieldName: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`, {
      [fieldName]: value,
    });
  }
}
