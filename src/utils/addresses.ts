import { Address, StrKey, hash } from "@stellar/stellar-sdk";
import { PoolId } from "../types/common";

/**
 * Address and pool-key utilities.
 */

const POOL_ID_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Validate a Stellar public key (G... address).
 *
 * @example
 * ```ts
 * isValidPublicKey(Keypair.random().publicKey()); // true
 * isValidPublicKey('invalid'); // false
 * ```
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a Soroban contract address (C... address).
 *
 * Hooks are identified by their contract address, so this is the check
 * applied to `authorizedHook` and to every writer capability.
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any Stellar address (public key or contract).
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}

/**
 * Sort two token addresses deterministically.
 *
 * @throws {Error} If tokenA and tokenB are identical
 */
export function sortTokens(tokenA: string, tokenB: string): [string, string] {
  if (tokenA === tokenB) throw new Error("Identical tokens");
  return tokenA < tokenB ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * Shorten an address or pool key for log output.
 *
 * @example
 * ```ts
 * truncateAddress('GBRPYHIL2CI3FNQ4BXLFMNDLFJUNPU2HY3ZMFSHONUCEOASW7QC7OX2H'); // 'GBRP...OX2H'
 * ```
 */
export function truncateAddress(address: string, chars: number = 4): string {
  if (address.length <= chars * 2 + 3) return address;
  return `${address.slice(0, chars)}...${address.slice(-chars)}`;
}

/**
 * Normalise a pool key to 64 lowercase hex characters.
 *
 * Accepts an optional 0x prefix and either case.
 *
 * @returns The normalised key, or null if the input is not a 32-byte hex key
 */
export function normalizePoolId(pool: string): PoolId | null {
  const stripped = pool.startsWith("0x") || pool.startsWith("0X") ? pool.slice(2) : pool;
  const lower = stripped.toLowerCase();
  return POOL_ID_PATTERN.test(lower) ? lower : null;
}

/**
 * Convert a pool key to its 32 raw bytes.
 */
export function poolIdToBuffer(pool: PoolId): Buffer {
  return Buffer.from(pool, "hex");
}

/**
 * Derive the pool key for a token pair and its fee/tick-spacing tier.
 *
 * key = sha256(token0_bytes || token1_bytes || feeTier_u32be || tickSpacing_i32be)
 * with token0 < token1, so argument order does not matter.
 *
 * @example
 * ```ts
 * getPoolId(usdc, xlm, 3000, 60) === getPoolId(xlm, usdc, 3000, 60); // true
 * ```
 */
export function getPoolId(
  tokenA: string,
  tokenB: string,
  feeTier: number,
  tickSpacing: number,
): PoolId {
  const [token0, token1] = sortTokens(tokenA, tokenB);

  const params = Buffer.alloc(8);
  params.writeUInt32BE(feeTier, 0);
  params.writeInt32BE(tickSpacing, 4);

  const digest = hash(
    Buffer.concat([
      Address.fromString(token0).toBuffer(),
      Address.fromString(token1).toBuffer(),
      params,
    ]),
  );

  return digest.toString("hex");
}
