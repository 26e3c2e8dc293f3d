import { Clock, Logger, PoolId } from "../types/common";
import { FeeBreakdown } from "../types/fee";
import { FeeController, systemClock } from "./fees";

export interface TrackedSnapshot extends FeeBreakdown {
  timestamp: number;
}

export interface FeeTrackerOptions {
  logger?: Logger;
  /** Number of snapshots retained in `history` */
  historySize?: number;
  clock?: Clock;
}

/**
 * Lightweight observer of one pool's fee state.
 *
 * Records snapshots and reports when a cap event starts or ends, judged
 * from the surge fee rather than the controller's inCap flag.
 */
export class FeeTracker {
  private readonly controller: FeeController;
  private readonly pool: PoolId;
  private readonly logger?: Logger;
  private readonly historySize: number;
  private readonly clock: Clock;
  private readonly snapshots: TrackedSnapshot[] = [];
  private lastInCap = false;
  private capEvents = 0;

  constructor(controller: FeeController, pool: PoolId, options: FeeTrackerOptions = {}) {
    this.controller = controller;
    this.pool = pool;
    this.logger = options.logger;
    this.historySize = options.historySize ?? 100;
    this.clock = options.clock ?? systemClock;
  }

  snapshot(): FeeBreakdown {
    return this.controller.getTotalFee(this.pool);
  }

  /**
   * Take a snapshot, log it, and detect cap START/END edges.
   *
   * @returns The edge seen by this call, if any
   */
  log(prefix?: string): "start" | "end" | null {
    const fees = this.snapshot();
    const inCap = fees.surgeFeePpm > 0;

    this.snapshots.push({ ...fees, timestamp: this.clock() });
    if (this.snapshots.length > this.historySize) {
      this.snapshots.shift();
    }

    const msg = `BaseFee=${fees.baseFeePpm}ppm, SurgeFee=${fees.surgeFeePpm}ppm, TotalFee=${fees.totalFeePpm}ppm`;
    this.logger?.info(prefix ? `${prefix} ${msg}` : msg, { pool: this.pool });

    let edge: "start" | "end" | null = null;
    if (inCap && !this.lastInCap) {
      this.capEvents++;
      this.logger?.info(">> CAP event START", { pool: this.pool });
      edge = "start";
    } else if (!inCap && this.lastInCap) {
      this.logger?.info(">> CAP event END", { pool: this.pool });
      edge = "end";
    }

    this.lastInCap = inCap;
    return edge;
  }

  get history(): readonly TrackedSnapshot[] {
    return this.snapshots;
  }

  /** Number of START edges seen so far. */
  get capEventCount(): number {
    return this.capEvents;
  }
}
