/**
 * SnapshotManager: runs one collection cycle and reports it as a
 * CollectionResult: a complete snapshot, or a failure naming the category
 * that broke.
 *
 * Collectors run one after another in a fixed order:
 *   platform → network → hardware → process
 * The first collector-fatal error ends the cycle. Nothing is cached or
 * retried here; the scheduler's next trigger is the retry.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  CollectionResult,
  HardwareInfo,
  NetworkInfo,
  PlatformInfo,
  ProcessSnapshot,
  TelemetryCategory,
} from '../../shared/types/system';
import { CollectorError } from '../../shared/types/errors';
import { createLogger } from './logger';
import { assembleSnapshot } from './snapshot-assembler';
import { HardwareCollector, NetworkCollector, PlatformCollector, ProcessCollector } from './collectors';
import type { HostSources } from './host/types';

const log = createLogger('SnapshotManager');

interface Collector<T> {
  collect(): Promise<T>;
}

export interface CategoryCollectors {
  platform: Collector<PlatformInfo>;
  network: Collector<NetworkInfo>;
  hardware: Collector<HardwareInfo>;
  process: Collector<ProcessSnapshot>;
}

export interface SnapshotManagerOptions {
  /** Wall clock in epoch ms */
  now?: () => number;
  createCycleId?: () => string;
}

/** What the scheduler needs from a manager */
export interface SnapshotSource {
  collect(): Promise<CollectionResult>;
}

export class SnapshotManager implements SnapshotSource {
  private readonly now: () => number;
  private readonly createCycleId: () => string;
  private lastCaptureMs = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly collectors: CategoryCollectors,
    options: SnapshotManagerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.createCycleId = options.createCycleId ?? (() => uuidv4());
  }

  static fromHost(host: HostSources, options: SnapshotManagerOptions & { cpuSampleMs?: number } = {}): SnapshotManager {
    return new SnapshotManager(
      {
        platform: new PlatformCollector(host.platform),
        network: new NetworkCollector(host.network),
        hardware: new HardwareCollector(host.hardware, { cpuSampleMs: options.cpuSampleMs }),
        process: new ProcessCollector(host.processes),
      },
      options,
    );
  }

  async collect(): Promise<CollectionResult> {
    const cycleId = this.createCycleId();
    const capturedAt = this.captureInstant();
    let running: TelemetryCategory = 'platform';

    const step = <T>(category: TelemetryCategory, collector: Collector<T>): Promise<T> => {
      running = category;
      return collector.collect();
    };

    try {
      const platform = await step('platform', this.collectors.platform);
      const network = await step('network', this.collectors.network);
      const hardware = await step('hardware', this.collectors.hardware);
      const processes = await step('process', this.collectors.process);

      const snapshot = assembleSnapshot(capturedAt, { platform, network, hardware, process: processes });
      log.debug(`Cycle ${cycleId} captured at ${snapshot.timestamp}`);
      return { ok: true, cycleId, snapshot };
    } catch (error) {
      const failure = CollectorError.wrap(running, error);
      log.warn(`Cycle ${cycleId} failed in ${failure.category} collector: ${failure.message}`);
      return {
        ok: false,
        cycleId,
        failure: {
          category: failure.category,
          code: failure.code,
          message: failure.message,
          occurredAt: new Date(this.now()).toISOString(),
        },
      };
    }
  }

  /** Taken before any collector runs; never repeats or goes backwards */
  private captureInstant(): Date {
    let ms = this.now();
    if (ms <= this.lastCaptureMs) ms = this.lastCaptureMs + 1;
    this.lastCaptureMs = ms;
    return new Date(ms);
  }
}
