import {
  Contract,
  SorobanRpc,
  TransactionBuilder,
  xdr,
} from "@stellar/stellar-sdk";
import { NetworkError, ValidationError, mapError } from "../errors";
import { ErrorParser } from "../errors/parser";
import { Logger, PoolId } from "../types/common";
import { TickSource } from "../types/oracle";
import { poolIdToBuffer } from "../utils/addresses";
import { withRetry, RetryOptions } from "../utils/retry";
import { validatePoolId, validateTick } from "../utils/validation";

/** Zero-key account used as the source of read-only simulations. */
const SIMULATION_SOURCE = "GAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAWHF";

function scValToI32(val: xdr.ScVal, field: string): number {
  if (val.switch().name !== "scvI32") {
    throw new ValidationError(`Expected i32 for ${field}, got ${val.switch().name}`);
  }
  return val.i32();
}

function scValToU32(val: xdr.ScVal, field: string): number {
  if (val.switch().name !== "scvU32") {
    throw new ValidationError(`Expected u32 for ${field}, got ${val.switch().name}`);
  }
  return val.u32();
}

/**
 * Read-only client for a Soroban pool-manager contract.
 *
 * Supplies the engine's current tick per pool by simulating
 * `get_tick(pool_id)`; nothing is ever submitted.
 */
export class SorobanPoolManagerClient implements TickSource {
  private contract: Contract;
  private server: SorobanRpc.Server;
  private networkPassphrase: string;
  private retryOptions: RetryOptions;
  private timeoutSeconds: number;
  private logger?: Logger;
  readonly address: string;

  constructor(
    contractAddress: string,
    rpcUrl: string,
    networkPassphrase: string,
    retryOptions: RetryOptions,
    logger?: Logger,
    timeoutSeconds: number = 30,
  ) {
    this.address = contractAddress;
    this.contract = new Contract(contractAddress);
    this.server = new SorobanRpc.Server(rpcUrl);
    this.networkPassphrase = networkPassphrase;
    this.retryOptions = retryOptions;
    this.timeoutSeconds = timeoutSeconds;
    this.logger = logger;
  }

  /**
   * Current price tick of a pool.
   *
   * @throws {NetworkError} If the simulation fails or returns nothing
   */
  async getCurrentTick(pool: PoolId): Promise<number> {
    const key = validatePoolId(pool);
    const result = await this.simulateRead("get_tick", key);
    const tick = scValToI32(result, "get_tick");
    validateTick(tick);
    return tick;
  }

  /**
   * Per-block tick allowance the contract currently enforces for a pool.
   */
  async getMaxTicksPerBlock(pool: PoolId): Promise<number> {
    const key = validatePoolId(pool);
    const result = await this.simulateRead("max_ticks_per_block", key);
    return scValToU32(result, "max_ticks_per_block");
  }

  private async simulateRead(method: string, pool: PoolId): Promise<xdr.ScVal> {
    const op = this.contract.call(method, xdr.ScVal.scvBytes(poolIdToBuffer(pool)));
    this.logger?.debug(`PoolManager: ${method}`, { contract: this.address, pool });

    try {
      const account = await withRetry(
        () => this.server.getAccount(SIMULATION_SOURCE),
        this.retryOptions,
        this.logger,
        "PoolManager_getAccount",
      );

      const tx = new TransactionBuilder(account, {
        fee: "100",
        networkPassphrase: this.networkPassphrase,
      })
        .addOperation(op)
        .setTimeout(this.timeoutSeconds)
        .build();

      const sim = await withRetry(
        () => this.server.simulateTransaction(tx),
        this.retryOptions,
        this.logger,
        "PoolManager_simulateTransaction",
      );

      if (SorobanRpc.Api.isSimulationSuccess(sim) && sim.result) {
        return sim.result.retval;
      }

      const reason = SorobanRpc.Api.isSimulationError(sim)
        ? ErrorParser.toHumanMessage(sim.error)
        : "empty result";
      throw new NetworkError(`Simulation of ${method} failed: ${reason}`, { method, pool });
    } catch (err: unknown) {
      const mapped = mapError(err);
      this.logger?.error(`PoolManager: ${method} failed`, mapped);
      throw mapped;
    }
  }
}
