/**
 * Typed error hierarchy for the fee engine.
 *
 * All errors extend CapFeeError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 */

import { ErrorParser } from "./errors/parser";

/**
 * Base error class for all engine errors.
 */
export class CapFeeError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CapFeeError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Read or write against a pool whose fee state was never initialized.
 */
export class NotInitializedError extends CapFeeError {
  constructor(pool: string) {
    super("NOT_INITIALIZED", `Fee state not initialized for pool ${pool}`, {
      pool,
    });
    this.name = "NotInitializedError";
  }
}

/**
 * Second initialization of a pool.
 *
 * The controller reports this as a notice rather than throwing it.
 */
export class AlreadyInitializedError extends CapFeeError {
  constructor(pool: string) {
    super("ALREADY_INITIALIZED", `Fee state already initialized for pool ${pool}`, {
      pool,
    });
    this.name = "AlreadyInitializedError";
  }
}

/**
 * Caller is not the designated writer.
 */
export class UnauthorizedError extends CapFeeError {
  constructor(caller: string) {
    super("UNAUTHORIZED", `Caller ${caller} is not the authorized hook`, {
      caller,
    });
    this.name = "UnauthorizedError";
  }
}

/**
 * Policy or configuration value outside its documented bounds.
 */
export class ParameterOutOfRangeError extends CapFeeError {
  constructor(parameter: string, value: unknown, reason: string) {
    super(
      "PARAMETER_OUT_OF_RANGE",
      `Parameter ${parameter} out of range: ${reason}`,
      { parameter, value: typeof value === "bigint" ? value.toString() : value },
    );
    this.name = "ParameterOutOfRangeError";
  }
}

/**
 * Requested lookback predates the oldest retained observation.
 *
 * Errors decoded from a contract may not carry the timestamps; `reason`
 * is the message then.
 */
export class StaleLookbackError extends CapFeeError {
  constructor(target: number | undefined, oldest: number | undefined, reason?: string) {
    super(
      "TARGET_TOO_OLD",
      target !== undefined && oldest !== undefined
        ? `Lookback target ${target} predates oldest observation ${oldest}`
        : reason ?? "Lookback target predates oldest observation",
      { target, oldest },
    );
    this.name = "StaleLookbackError";
  }
}

/**
 * Oracle write or read before the pool's oracle was enabled.
 */
export class NotEnabledError extends CapFeeError {
  constructor(pool: string) {
    super("ORACLE_NOT_ENABLED", `Oracle not enabled for pool ${pool}`, { pool });
    this.name = "NotEnabledError";
  }
}

/**
 * Oracle enabled twice for the same pool.
 */
export class AlreadyEnabledError extends CapFeeError {
  constructor(pool: string) {
    super("ORACLE_ALREADY_ENABLED", `Oracle already enabled for pool ${pool}`, {
      pool,
    });
    this.name = "AlreadyEnabledError";
  }
}

/**
 * Observation timestamp older than the last recorded one.
 */
export class OutOfOrderError extends CapFeeError {
  constructor(timestamp: number | undefined, last: number | undefined, reason?: string) {
    super(
      "OUT_OF_ORDER",
      timestamp !== undefined && last !== undefined
        ? `Observation timestamp ${timestamp} is older than last recorded ${last}`
        : reason ?? "Observation timestamp is older than the last recorded one",
      { timestamp, last },
    );
    this.name = "OutOfOrderError";
  }
}

/**
 * Invalid input parameters.
 */
export class ValidationError extends CapFeeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

/**
 * Network or RPC connection errors.
 */
export class NetworkError extends CapFeeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NETWORK_ERROR", message, details);
    this.name = "NetworkError";
  }
}

function detailString(err: unknown, key: string): string {
  if (err && typeof err === "object" && "details" in err) {
    const { details } = err;
    if (details && typeof details === "object" && key in details) {
      const value: unknown = Reflect.get(details, key);
      if (typeof value === "string") return value;
    }
  }
  return "unknown";
}

function detailNumber(err: unknown, key: string): number | undefined {
  if (err && typeof err === "object" && "details" in err) {
    const { details } = err;
    if (details && typeof details === "object" && key in details) {
      const value: unknown = Reflect.get(details, key);
      if (typeof value === "number") return value;
    }
  }
  return undefined;
}

/**
 * Map contract error codes to engine errors.
 */
function mapContractError(code: number, err: unknown): CapFeeError | null {
  const message = ErrorParser.parseContractError(code);
  const pool = detailString(err, "pool");

  switch (code) {
    case 100:
      return new AlreadyEnabledError(pool);
    case 101:
      return new NotEnabledError(pool);
    case 102:
      return new StaleLookbackError(
        detailNumber(err, "target"),
        detailNumber(err, "oldest"),
        message ?? undefined,
      );
    case 103:
      return new OutOfOrderError(
        detailNumber(err, "timestamp"),
        detailNumber(err, "last"),
        message ?? undefined,
      );
    case 104:
    case 300:
    case 301:
    case 302:
      return new ParameterOutOfRangeError(
        detailString(err, "parameter"),
        undefined,
        message ?? "rejected by contract",
      );
    case 200:
      return new AlreadyInitializedError(pool);
    case 201:
      return new NotInitializedError(pool);
    case 202:
      return new UnauthorizedError(detailString(err, "caller"));
    default:
      return null;
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Recognises contract error codes of the form `Error(Contract, #XXX)`,
 * connectivity failures and rate limiting; anything else becomes a
 * generic CapFeeError with code UNKNOWN_ERROR.
 */
export function mapError(err: unknown): CapFeeError {
  if (err instanceof CapFeeError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const normalizedMessage = message.toLowerCase();

  const errorCode = ErrorParser.extractErrorCode(err);
  if (errorCode !== null) {
    const mappedError = mapContractError(errorCode, err);
    if (mappedError) return mappedError;
  }

  if (
    message.includes("ECONNRESET") ||
    message.includes("ETIMEDOUT") ||
    message.includes("ENOTFOUND") ||
    message.includes("ENETUNREACH") ||
    normalizedMessage.includes("rate limit") ||
    normalizedMessage.includes("too many requests") ||
    message.includes("429")
  ) {
    return new NetworkError(message);
  }

  if (
    normalizedMessage.includes("unauthorized") ||
    normalizedMessage.includes("not authorized")
  ) {
    return new UnauthorizedError("unknown");
  }

  if (
    normalizedMessage.includes("invalid") ||
    normalizedMessage.includes("must be")
  ) {
    return new ValidationError(message);
  }

  return new CapFeeError("UNKNOWN_ERROR", ErrorParser.toHumanMessage(err), {
    originalError: err,
  });
}
