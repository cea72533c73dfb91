/**
 * DispatchScheduler - Periodic dispatch passes
 *
 * Wakes every `dispatchIntervalMs` and runs the dispatcher over all pending
 * rides. Passes never overlap: a tick that fires while a pass is still
 * running is skipped and counted. A pass that throws is logged and the loop
 * keeps going.
 */

import type { DispatchConfig } from '../models/types';
import type { AllocationDispatcher, DispatchPassSummary } from '../matchers/AllocationDispatcher';
import { DEFAULT_DISPATCH_CONFIG } from '../config/config';

export interface SchedulerStats {
  running: boolean;
  intervalMs: number;
  passes: number;
  failedPasses: number;
  skippedTicks: number;
  totalAssigned: number;
  totalExhausted: number;
  totalAborted: number;
  totalFailed: number;
  lastPass: DispatchPassSummary | null;
  lastError: string | null;
}

export class DispatchScheduler {
  private readonly dispatcher: AllocationDispatcher;
  private readonly intervalMs: number;

  private timer: NodeJS.Timeout | null = null;
  private passInFlight: Promise<DispatchPassSummary | null> | null = null;

  private passes = 0;
  private failedPasses = 0;
  private skippedTicks = 0;
  private totalAssigned = 0;
  private totalExhausted = 0;
  private totalAborted = 0;
  private totalFailed = 0;
  private lastPass: DispatchPassSummary | null = null;
  private lastError: string | null = null;

  constructor(
    dispatcher: AllocationDispatcher,
    config: Pick<DispatchConfig, 'dispatchIntervalMs'> = DEFAULT_DISPATCH_CONFIG
  ) {
    this.dispatcher = dispatcher;
    this.intervalMs = config.dispatchIntervalMs;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);

    console.log(`[DispatchScheduler] Started, interval ${this.intervalMs} ms`);
  }

  /**
   * Stop ticking. A pass already running is left to finish; await the
   * returned promise to wait for it.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[DispatchScheduler] Stopped');
    }
    if (this.passInFlight) {
      await this.passInFlight;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one pass now. Returns null, without running anything, if a pass is
   * already in flight, or if the pass itself failed.
   */
  async runPass(): Promise<DispatchPassSummary | null> {
    if (this.passInFlight) {
      this.skippedTicks += 1;
      console.log('[DispatchScheduler] Previous pass still running, skipping');
      return null;
    }

    this.passInFlight = this.executePass();
    try {
      return await this.passInFlight;
    } finally {
      this.passInFlight = null;
    }
  }

  getStats(): SchedulerStats {
    return {
      running: this.isRunning(),
      intervalMs: this.intervalMs,
      passes: this.passes,
      failedPasses: this.failedPasses,
      skippedTicks: this.skippedTicks,
      totalAssigned: this.totalAssigned,
      totalExhausted: this.totalExhausted,
      totalAborted: this.totalAborted,
      totalFailed: this.totalFailed,
      lastPass: this.lastPass,
      lastError: this.lastError
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private tick(): void {
    // executePass never rejects, so nothing escapes the timer callback
    void this.runPass();
  }

  private async executePass(): Promise<DispatchPassSummary | null> {
    try {
      const summary = await this.dispatcher.dispatchPending();

      this.passes += 1;
      this.totalAssigned += summary.assigned;
      this.totalExhausted += summary.exhausted;
      this.totalAborted += summary.aborted;
      this.totalFailed += summary.failed;
      this.lastPass = summary;

      return summary;
    } catch (error) {
      this.failedPasses += 1;
      this.lastError = error instanceof Error ? error.message : String(error);
      console.error('[DispatchScheduler] Dispatch pass failed:', error);
      return null;
    }
  }
}
