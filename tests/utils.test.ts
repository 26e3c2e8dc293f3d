import { Keypair, StrKey } from '@stellar/stellar-sdk';
import {
  getPoolId,
  isValidAddress,
  isValidContractId,
  isValidPublicKey,
  normalizePoolId,
  poolIdToBuffer,
  sortTokens,
  truncateAddress,
} from '../src/utils/addresses';
import {
  Rounding,
  divide,
  maxInt,
  maxUint,
  minInt,
  mulDiv,
  saturatingAdd,
  saturatingAddSigned,
  saturatingSub,
  toSafeNumber,
} from '../src/utils/math';
import { isRetryable, withRetry } from '../src/utils/retry';
import { validateTick, validateTimestamp } from '../src/utils/validation';
import { ValidationError } from '../src/errors';

const TOKEN_A = StrKey.encodeContract(Buffer.alloc(32, 1));
const TOKEN_B = StrKey.encodeContract(Buffer.alloc(32, 2));

describe('addresses', () => {
  it('validates contract and account addresses', () => {
    const account = Keypair.random().publicKey();
    expect(isValidContractId(TOKEN_A)).toBe(true);
    expect(isValidContractId(account)).toBe(false);
    expect(isValidPublicKey(account)).toBe(true);
    expect(isValidAddress(account)).toBe(true);
    expect(isValidAddress('invalid')).toBe(false);
  });

  it('sorts tokens and rejects identical pairs', () => {
    expect(sortTokens(TOKEN_B, TOKEN_A)).toEqual(sortTokens(TOKEN_A, TOKEN_B));
    expect(() => sortTokens(TOKEN_A, TOKEN_A)).toThrow('Identical tokens');
  });

  it('derives an order-independent 32-byte pool key', () => {
    const id = getPoolId(TOKEN_A, TOKEN_B, 3000, 60);
    expect(id).toMatch(/^[0-9a-f]{64}$/);
    expect(getPoolId(TOKEN_B, TOKEN_A, 3000, 60)).toBe(id);
    expect(getPoolId(TOKEN_A, TOKEN_B, 500, 60)).not.toBe(id);
    expect(getPoolId(TOKEN_A, TOKEN_B, 3000, -60)).not.toBe(id);
  });

  it('normalises pool keys', () => {
    expect(normalizePoolId('0X' + 'AB'.repeat(32))).toBe('ab'.repeat(32));
    expect(normalizePoolId('ab'.repeat(31))).toBeNull();
    expect(normalizePoolId('zz'.repeat(32))).toBeNull();
    expect(poolIdToBuffer('ff'.repeat(32))).toEqual(Buffer.alloc(32, 0xff));
  });

  it('truncates long identifiers for logs', () => {
    expect(truncateAddress('GBRPYHIL2CI3FNQ4BXLFMNDLFJUNPU2HY3ZMFSHONUCEOASW7QC7OX2H')).toBe('GBRP...OX2H');
    expect(truncateAddress('short')).toBe('short');
  });
});

describe('validation', () => {
  it('bounds timestamps to positive uint32', () => {
    expect(() => validateTimestamp(4_294_967_295)).not.toThrow();
    expect(() => validateTimestamp(4_294_967_296)).toThrow(ValidationError);
    expect(() => validateTimestamp(0)).toThrow('timestamp must be a positive uint32 integer');
  });

  it('bounds ticks to int24', () => {
    expect(() => validateTick(-8_388_608)).not.toThrow();
    expect(() => validateTick(8_388_608)).toThrow(ValidationError);
    expect(() => validateTick(1.5)).toThrow(ValidationError);
  });
});

describe('math', () => {
  it('computes fixed-width bounds', () => {
    expect(maxUint(8)).toBe(255n);
    expect(minInt(8)).toBe(-128n);
    expect(maxInt(56)).toBe(36_028_797_018_963_967n);
  });

  it('saturates unsigned arithmetic', () => {
    expect(saturatingAdd(250n, 10n, 255n)).toBe(255n);
    expect(saturatingSub(5n, 10n)).toBe(0n);
  });

  it('saturates signed arithmetic at the int width', () => {
    expect(saturatingAddSigned(maxInt(56), 1n, 56)).toBe(maxInt(56));
    expect(saturatingAddSigned(minInt(56), -1n, 56)).toBe(minInt(56));
    expect(saturatingAddSigned(10n, -3n, 56)).toBe(7n);
  });

  it('rounds divisions as requested', () => {
    expect(divide(-7n, 2n, Rounding.ROUND_DOWN)).toBe(-3n);
    expect(divide(-7n, 2n, Rounding.ROUND_FLOOR)).toBe(-4n);
    expect(divide(7n, 2n, Rounding.ROUND_FLOOR)).toBe(3n);
    expect(divide(7n, 2n, Rounding.ROUND_UP)).toBe(4n);
    expect(divide(-8n, 2n, Rounding.ROUND_FLOOR)).toBe(-4n);
    expect(mulDiv(10n, 3n, 4n)).toBe(7n);
    expect(mulDiv(10n, 3n, 4n, Rounding.ROUND_UP)).toBe(8n);
  });

  it('rejects division by zero', () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(RangeError);
  });

  it('refuses to narrow unsafe integers', () => {
    expect(toSafeNumber(42n)).toBe(42);
    expect(() => toSafeNumber(2n ** 53n)).toThrow(RangeError);
  });
});

describe('retry', () => {
  it('classifies transient failures', () => {
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
    expect(isRetryable({ code: 'ETIMEDOUT' })).toBe(true);
    expect(isRetryable({ response: { status: 503 } })).toBe(true);
    expect(isRetryable(new Error('boom'))).toBe(false);
    expect(isRetryable(null)).toBe(false);
  });

  it('retries until success', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('ETIMEDOUT'))
      .mockRejectedValueOnce(new Error('ETIMEDOUT'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 2 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('gives up after maxRetries', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('ETIMEDOUT'));

    await expect(withRetry(fn, { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow('ETIMEDOUT');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
