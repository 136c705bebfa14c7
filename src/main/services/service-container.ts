/**
 * ServiceContainer: builds and wires the monitor's services.
 *
 * Usage:
 *   const container = new ServiceContainer();
 *   container.init();
 *   container.get('scheduler').start();
 *   ...
 *   await container.shutdown();
 */

import { createLogger } from './logger';
import { ConfigService } from './config';
import type { ConfigServiceOptions } from './config';
import { createHostSources } from './host/host-sources';
import type { HostSources } from './host/types';
import { SnapshotManager } from './snapshot-manager';
import { RefreshScheduler } from './refresh-scheduler';
import { SnapshotExporter } from './snapshot-exporter';
import { ConsolePresenter } from './console-presenter';
import { ErrorCode, TelemetryError } from '../../shared/types/errors';

const log = createLogger('Container');

export interface ServiceMap {
  config: ConfigService;
  manager: SnapshotManager;
  scheduler: RefreshScheduler;
  exporter: SnapshotExporter;
  presenter: ConsolePresenter;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions extends ConfigServiceOptions {
  /** Substitute OS sources (tests) */
  host?: HostSources;
}

export class ServiceContainer {
  private services: ServiceMap | null = null;
  private disposers: Array<() => void> = [];

  init(options: ContainerOptions = {}): void {
    if (this.services) return;

    const config = new ConfigService(options);
    const manager = SnapshotManager.fromHost(options.host ?? createHostSources(), {
      cpuSampleMs: config.get('cpuSampleMs'),
    });
    const scheduler = new RefreshScheduler(manager, {
      intervalMs: config.get('refreshIntervalMs'),
      autoRefresh: config.get('autoRefresh'),
      refreshOnStart: config.get('refreshOnStart'),
    });
    const exporter = new SnapshotExporter(config.get('exportPath'));
    const presenter = new ConsolePresenter(scheduler, config.get('topProcessCount'));

    this.disposers.push(
      config.onChange('refreshIntervalMs', (ms) => scheduler.setIntervalMs(ms)),
      config.onChange('autoRefresh', (enabled) => {
        if (scheduler.isAutoRefreshEnabled() !== enabled) scheduler.toggleAutoRefresh();
      }),
    );

    this.services = { config, manager, scheduler, exporter, presenter };
    log.info(`Services ready (config: ${config.getConfigPath()})`);
  }

  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.services) {
      throw new TelemetryError('ServiceContainer used before init()', ErrorCode.INVALID_STATE);
    }
    return this.services[key];
  }

  /** Stops the scheduler after its in-flight cycle, then releases everything */
  async shutdown(): Promise<void> {
    if (!this.services) return;
    const { scheduler, presenter, config } = this.services;
    presenter.detach();
    await scheduler.shutdown();
    for (const dispose of this.disposers) dispose();
    this.disposers = [];
    config.shutdown();
    this.services = null;
    log.info('Shut down');
  }
}
