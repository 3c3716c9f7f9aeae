/**
 * SyncScheduler - fixed-interval driver for sync cycles
 *
 * - One cycle at a time: a tick that fires while a cycle runs is dropped,
 *   not queued
 * - No backoff: a failed cycle is simply retried on the next tick
 */

import { syncLogger } from "../logger.js";

import type { CycleOutcome, CycleRunner } from "./sync/cycle.js";

// ============================================================================
// Types
// ============================================================================

export interface SchedulerOptions {
  intervalMs: number;
  runOnStart?: boolean;
}

export type TickResult =
  | { status: "ran"; outcome: CycleOutcome }
  | { status: "dropped" };

export interface SchedulerStatus {
  started: boolean;
  running: boolean;
  intervalMs: number;
  cyclesRun: number;
  droppedTicks: number;
  lastOutcome: CycleOutcome | null;
  lastSuccessAt: Date | null;
}

// ============================================================================
// SyncScheduler
// ============================================================================

export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private cyclesRun = 0;
  private droppedTicks = 0;
  private lastOutcome: CycleOutcome | null = null;
  private lastSuccessAt: Date | null = null;

  constructor(
    private cycle: CycleRunner,
    private options: SchedulerOptions
  ) {}

  start(): void {
    if (this.timer !== null) {
      return;
    }

    this.timer = setInterval(() => {
      this.runScheduledTick();
    }, this.options.intervalMs);

    syncLogger.info(
      { intervalMs: this.options.intervalMs },
      "Sync scheduler started"
    );

    if (this.options.runOnStart === true) {
      this.runScheduledTick();
    }
  }

  /**
   * Stop firing ticks and wait for the cycle in flight, if any.
   */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      syncLogger.info("Sync scheduler stopped");
    }
    if (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  /**
   * Run a cycle now unless one is already running.
   */
  async tick(): Promise<TickResult> {
    if (this.inFlight !== null) {
      this.droppedTicks++;
      syncLogger.debug(
        { droppedTicks: this.droppedTicks },
        "Sync cycle still running; dropping tick"
      );
      return { status: "dropped" };
    }

    this.inFlight = this.cycle.run();
    try {
      const outcome = await this.inFlight;
      this.cyclesRun++;
      this.lastOutcome = outcome;
      if (outcome.status === "succeeded") {
        this.lastSuccessAt = outcome.finishedAt;
      }
      return { status: "ran", outcome };
    } finally {
      this.inFlight = null;
    }
  }

  status(): SchedulerStatus {
    return {
      started: this.timer !== null,
      running: this.inFlight !== null,
      intervalMs: this.options.intervalMs,
      cyclesRun: this.cyclesRun,
      droppedTicks: this.droppedTicks,
      lastOutcome: this.lastOutcome,
      lastSuccessAt: this.lastSuccessAt,
    };
  }

  private runScheduledTick(): void {
    this.tick().catch((error: unknown) => {
      syncLogger.error({ error }, "Scheduled sync tick failed");
    });
  }
}
