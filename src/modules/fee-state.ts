import { WIDTHS } from "../config";
import { ParameterOutOfRangeError } from "../errors";
import { FeeStateFields } from "../types/fee";
import { clamp, fitsUint, maxUint, mulDiv, saturatingAdd, saturatingSub } from "../utils/math";

/**
 * Packed layout of a pool's fee-controller word, low bits first.
 */
const LAYOUT = {
  freq: { offset: 0, width: WIDTHS.FREQ },
  baseFeePpm: { offset: 96, width: WIDTHS.BASE_FEE },
  freqLastUpdate: { offset: 128, width: WIDTHS.FREQ_LAST_UPDATE },
  capStart: { offset: 168, width: WIDTHS.CAP_START },
  lastFeeUpdate: { offset: 208, width: WIDTHS.LAST_FEE_UPDATE },
  inCap: { offset: 248, width: WIDTHS.IN_CAP },
} as const;

type FieldName = keyof typeof LAYOUT;

const WORD_BITS = LAYOUT.inCap.offset + LAYOUT.inCap.width;

export const MAX_FREQ = maxUint(WIDTHS.FREQ);

/** The all-zero word: a pool that was never initialized. */
export const UNINITIALIZED_WORD = 0n;

function field(word: bigint, name: FieldName): bigint {
  const { offset, width } = LAYOUT[name];
  return (word >> BigInt(offset)) & maxUint(width);
}

function checkedField(name: FieldName, value: bigint | number): bigint {
  const v = BigInt(value);
  if (!fitsUint(v, LAYOUT[name].width)) {
    throw new ParameterOutOfRangeError(
      name,
      v,
      `must fit in ${LAYOUT[name].width} unsigned bits`,
    );
  }
  return v << BigInt(LAYOUT[name].offset);
}

/**
 * Pack controller fields into a single word.
 *
 * @throws {ParameterOutOfRangeError} If any field does not fit its width
 */
export function packFeeState(fields: FeeStateFields): bigint {
  if (!Number.isInteger(fields.baseFeePpm)) {
    throw new ParameterOutOfRangeError("baseFeePpm", fields.baseFeePpm, "must be an integer");
  }
  for (const name of ["freqLastUpdate", "capStart", "lastFeeUpdate"] as const) {
    if (!Number.isInteger(fields[name])) {
      throw new ParameterOutOfRangeError(name, fields[name], "must be an integer");
    }
  }

  return (
    checkedField("freq", fields.freq) |
    checkedField("baseFeePpm", fields.baseFeePpm) |
    checkedField("freqLastUpdate", fields.freqLastUpdate) |
    checkedField("capStart", fields.capStart) |
    checkedField("lastFeeUpdate", fields.lastFeeUpdate) |
    checkedField("inCap", fields.inCap ? 1 : 0)
  );
}

/**
 * Unpack a word produced by packFeeState.
 *
 * @throws {ParameterOutOfRangeError} If the word is negative or wider than the layout
 */
export function unpackFeeState(word: bigint): FeeStateFields {
  if (!fitsUint(word, WORD_BITS)) {
    throw new ParameterOutOfRangeError("word", word, `must fit in ${WORD_BITS} unsigned bits`);
  }
  return {
    freq: field(word, "freq"),
    baseFeePpm: Number(field(word, "baseFeePpm")),
    freqLastUpdate: Number(field(word, "freqLastUpdate")),
    capStart: Number(field(word, "capStart")),
    lastFeeUpdate: Number(field(word, "lastFeeUpdate")),
    inCap: field(word, "inCap") === 1n,
  };
}

export function isUninitialized(word: bigint): boolean {
  return word === UNINITIALIZED_WORD;
}

/**
 * Fresh state for a newly initialized pool. `now` must be positive so the
 * resulting word is never zero.
 */
export function initialFeeState(baseFeePpm: number, now: number): FeeStateFields {
  if (now <= 0) {
    throw new ParameterOutOfRangeError("now", now, "must be positive");
  }
  return {
    freq: 0n,
    baseFeePpm,
    freqLastUpdate: now,
    capStart: 0,
    lastFeeUpdate: now,
    inCap: false,
  };
}

/**
 * Linear decay of the frequency accumulator since freqLastUpdate.
 *
 * Elapsed time is clamped at zero; a zero window or an elapsed time of a
 * full window clears the accumulator.
 */
export function decayFreq(
  state: FeeStateFields,
  now: number,
  decayWindowSeconds: number,
): FeeStateFields {
  const elapsed = Math.max(0, now - state.freqLastUpdate);
  if (elapsed === 0 || state.freq === 0n) {
    return state;
  }
  if (decayWindowSeconds <= 0 || elapsed >= decayWindowSeconds) {
    return { ...state, freq: 0n };
  }
  const decay = mulDiv(state.freq, BigInt(elapsed), BigInt(decayWindowSeconds));
  return { ...state, freq: saturatingSub(state.freq, decay) };
}

/**
 * Register a cap event: restart the surge clock and bump the accumulator,
 * saturating at MAX_FREQ.
 */
export function recordCapEvent(
  state: FeeStateFields,
  now: number,
  increment: bigint,
): FeeStateFields {
  return {
    ...state,
    inCap: true,
    capStart: now,
    freq: saturatingAdd(state.freq, increment, MAX_FREQ),
  };
}

export function clearCapEvent(state: FeeStateFields): FeeStateFields {
  return { ...state, inCap: false, capStart: 0 };
}

/**
 * Set the base fee, clamped to the pool's bounds.
 */
export function withBaseFee(
  state: FeeStateFields,
  baseFeePpm: number,
  minBaseFeePpm: number,
  maxBaseFeePpm: number,
): FeeStateFields {
  return { ...state, baseFeePpm: clamp(baseFeePpm, minBaseFeePpm, maxBaseFeePpm) };
}

export function stampFreqUpdate(state: FeeStateFields, now: number): FeeStateFields {
  return { ...state, freqLastUpdate: now };
}

export function stampFeeUpdate(state: FeeStateFields, now: number): FeeStateFields {
  return { ...state, lastFeeUpdate: now };
}
