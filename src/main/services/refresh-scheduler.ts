/**
 * RefreshScheduler: decides when a collection cycle runs.
 *
 * State has two independent axes:
 * - phase: 'idle' | 'collecting', at most one cycle in flight
 * - autoRefresh: on/off, gates timer fires only
 *
 * Timer fires while disabled or while collecting are dropped, not queued.
 * Manual refresh runs regardless of autoRefresh and is a no-op while a cycle
 * is in flight. A failed cycle keeps the last good snapshot; nothing thrown
 * by a cycle or a listener escapes the scheduler.
 */

import type { CollectionFailure, CollectionResult, SystemSnapshot } from '../../shared/types/system';
import { ErrorCode, TelemetryError } from '../../shared/types/errors';
import { createLogger } from './logger';
import type { SnapshotSource } from './snapshot-manager';

const log = createLogger('RefreshScheduler');

export const DEFAULT_REFRESH_INTERVAL_MS = 5000;

export type SchedulerPhase = 'idle' | 'collecting';

export type TriggerSource = 'startup' | 'timer' | 'manual';

export interface SchedulerState {
  phase: SchedulerPhase;
  autoRefresh: boolean;
  /** Whether the interval timer is armed */
  started: boolean;
  intervalMs: number;
}

export interface SchedulerListener {
  onResult?(result: CollectionResult, trigger: TriggerSource): void;
  onSnapshot?(snapshot: SystemSnapshot): void;
  onFailure?(failure: CollectionFailure): void;
  onStateChange?(state: SchedulerState): void;
}

export interface RefreshSchedulerOptions {
  intervalMs?: number;
  autoRefresh?: boolean;
  /** Run one cycle as soon as start() is called */
  refreshOnStart?: boolean;
}

export class RefreshScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private intervalMs: number;
  private autoRefresh: boolean;
  private readonly refreshOnStart: boolean;

  /** In-flight guard: tested and set synchronously, before the cycle's first await */
  private collecting = false;
  private inFlight: Promise<CollectionResult | null> | null = null;

  private lastSnapshot: SystemSnapshot | null = null;
  private lastResult: CollectionResult | null = null;
  private listeners = new Set<SchedulerListener>();

  constructor(
    private readonly source: SnapshotSource,
    options: RefreshSchedulerOptions = {},
  ) {
    this.intervalMs = RefreshScheduler.validInterval(options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS);
    this.autoRefresh = options.autoRefresh ?? true;
    this.refreshOnStart = options.refreshOnStart ?? true;
  }

  private static validInterval(ms: number): number {
    if (!Number.isFinite(ms) || ms <= 0) {
      throw new TelemetryError(`Refresh interval must be a positive number of ms, got ${ms}`, ErrorCode.INVALID_STATE);
    }
    return ms;
  }

  // ─── Start / Stop ───

  start(): void {
    if (this.timer) return;
    this.armTimer();
    log.info(`Started (every ${this.intervalMs}ms, auto-refresh ${this.autoRefresh ? 'on' : 'off'})`);
    this.emitState();
    if (this.refreshOnStart) void this.runCycle('startup');
  }

  /** Disarms the timer; a cycle already running is left to finish */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.emitState();
  }

  setIntervalMs(ms: number): void {
    this.intervalMs = RefreshScheduler.validInterval(ms);
    if (this.timer) {
      clearInterval(this.timer);
      this.armTimer();
    }
    this.emitState();
  }

  /** Stop, wait for the in-flight cycle, drop listeners */
  async shutdown(): Promise<void> {
    this.stop();
    await this.inFlight;
    this.listeners.clear();
  }

  private armTimer(): void {
    this.timer = setInterval(() => this.onTimerFire(), this.intervalMs);
  }

  private onTimerFire(): void {
    if (!this.autoRefresh) return;
    if (this.collecting) {
      log.debug('Timer fire dropped, cycle still in flight');
      return;
    }
    void this.runCycle('timer');
  }

  // ─── Controls ───

  /** Resolves null when a cycle was already in flight */
  triggerManualRefresh(): Promise<CollectionResult | null> {
    if (this.collecting) {
      log.debug('Manual refresh ignored, cycle still in flight');
      return Promise.resolve(null);
    }
    return this.runCycle('manual');
  }

  /** Flips auto-refresh and returns the new value; never starts or aborts a cycle */
  toggleAutoRefresh(): boolean {
    this.autoRefresh = !this.autoRefresh;
    log.info(`Auto-refresh ${this.autoRefresh ? 'enabled' : 'disabled'}`);
    this.emitState();
    return this.autoRefresh;
  }

  isAutoRefreshEnabled(): boolean {
    return this.autoRefresh;
  }

  getState(): SchedulerState {
    return {
      phase: this.collecting ? 'collecting' : 'idle',
      autoRefresh: this.autoRefresh,
      started: this.timer !== null,
      intervalMs: this.intervalMs,
    };
  }

  /** Last known good snapshot */
  getLastSnapshot(): SystemSnapshot | null {
    return this.lastSnapshot;
  }

  getLastResult(): CollectionResult | null {
    return this.lastResult;
  }

  /** Returns an unsubscribe function */
  subscribe(listener: SchedulerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Cycle ───

  private runCycle(trigger: TriggerSource): Promise<CollectionResult | null> {
    if (this.collecting) return Promise.resolve(null);
    this.collecting = true;
    this.emitState();
    const cycle = this.executeCycle(trigger);
    this.inFlight = cycle;
    return cycle;
  }

  private async executeCycle(trigger: TriggerSource): Promise<CollectionResult | null> {
    let result: CollectionResult | null = null;
    try {
      result = await this.source.collect();
    } catch (error) {
      log.error(`Snapshot source threw during ${trigger} cycle:`, error);
    } finally {
      this.collecting = false;
      this.inFlight = null;
    }

    this.emitState();
    if (result) this.publish(result, trigger);
    return result;
  }

  private publish(result: CollectionResult, trigger: TriggerSource): void {
    this.lastResult = result;
    if (result.ok) {
      const { snapshot } = result;
      this.lastSnapshot = snapshot;
      this.notify((l) => l.onSnapshot?.(snapshot));
    } else {
      const { failure } = result;
      log.warn(`Refresh failed (${failure.category}): ${failure.message}`);
      this.notify((l) => l.onFailure?.(failure));
    }
    this.notify((l) => l.onResult?.(result, trigger));
  }

  private emitState(): void {
    const state = this.getState();
    this.notify((l) => l.onStateChange?.(state));
  }

  private notify(call: (listener: SchedulerListener) => void): void {
    for (const listener of this.listeners) {
      try {
        call(listener);
      } catch (err) {
        log.error('Scheduler listener error:', err);
      }
    }
  }
}
