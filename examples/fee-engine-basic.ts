/**
 * Basic Fee Engine Example
 *
 * Reads the current tick of a pool from a deployed pool-manager contract,
 * runs a few swaps through the engine, and prints how the base and surge
 * fees react when a swap moves the tick further than the cap allows.
 *
 * Prerequisites:
 * - A pool-manager contract exposing get_tick(pool_id) on the target network
 * - Environment variables configured (see below)
 *
 * Without CAPFEE_POOL_MANAGER the example falls back to an in-process tick
 * sequence, so it also runs offline.
 */

import 'dotenv/config';
import { CapFeeEngine } from '../src/client';
import { Network } from '../src/config';
import { CapFeeError } from '../src/errors';
import { MockTickSource } from '../src/test/mocks/MockTickSource';
import { Logger } from '../src/types/common';
import { getPoolId } from '../src/utils/addresses';

const consoleLogger: Logger = {
  debug: () => undefined,
  info: (msg, data) => console.log(`[info] ${msg}`, data ?? ''),
  error: (msg, err) => console.error(`[error] ${msg}`, err ?? ''),
};

async function main() {
  const hook = process.env.CAPFEE_HOOK_ADDRESS;
  const tokenA = process.env.CAPFEE_TOKEN_A;
  const tokenB = process.env.CAPFEE_TOKEN_B;
  const poolManager = process.env.CAPFEE_POOL_MANAGER;
  const network = process.env.CAPFEE_NETWORK === 'mainnet' ? Network.MAINNET : Network.TESTNET;

  if (!hook || !tokenA || !tokenB) {
    console.error('Missing required environment variables:');
    console.error('  - CAPFEE_HOOK_ADDRESS');
    console.error('  - CAPFEE_TOKEN_A');
    console.error('  - CAPFEE_TOKEN_B');
    process.exit(1);
  }

  const pool = getPoolId(tokenA, tokenB, 3000, 60);
  const offline = new MockTickSource();
  offline.queueTicks(pool, [0, 20, 140, 150, 150]);

  let now = Math.floor(Date.now() / 1000);
  const engine = new CapFeeEngine({
    authorizedHook: hook,
    network,
    rpcUrl: process.env.CAPFEE_RPC_URL,
    poolManagerAddress: poolManager,
    tickSource: poolManager ? undefined : offline,
    clock: () => now,
    logger: consoleLogger,
  });

  const initial = await engine.initializePool(pool);
  console.log(`Pool ${pool}`);
  console.log(`  initial base fee: ${initial.baseFeePpm} ppm`);

  const tracker = engine.tracker(pool);
  for (let i = 0; i < 4; i++) {
    now += 60;
    const outcome = await engine.onSwap(pool, { hook });
    console.log(
      `  swap ${i + 1}: tick=${outcome.tick} recorded=${outcome.truncatedTick} capped=${outcome.wasCapped}`,
    );
    tracker.log(`  after swap ${i + 1}:`);
  }

  console.log(`  TWAP over last 120s: ${engine.consult(pool, 120)}`);
}

main().catch((err: unknown) => {
  if (err instanceof CapFeeError) {
    console.error(`${err.code}: ${err.message}`, err.details ?? '');
  } else {
    console.error(err);
  }
  process.exit(1);
});
