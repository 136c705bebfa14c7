import type { CollectionFailure, SystemSnapshot } from '../../shared/types/system';
import { createLogger } from './logger';
import type { RefreshScheduler, SchedulerState } from './refresh-scheduler';

const log = createLogger('Display');

const gb = (bytes: number): string => (bytes / 1024 ** 3).toFixed(1);

export function formatSnapshotSummary(snapshot: SystemSnapshot, topN: number): string[] {
  const { platform, network, hardware, process } = snapshot;
  const { cpu, memory } = hardware;
  const lines: string[] = [];

  lines.push(`Last update: ${snapshot.timestamp}`);
  lines.push(`OS: ${platform.system} ${platform.release} (${platform.machine}) | ${platform.runtimeVersion}`);

  const frequency = cpu.frequency ? ` @ ${cpu.frequency.current.toFixed(0)} MHz` : '';
  lines.push(
    `CPU: ${cpu.usagePercent.toFixed(1)}% | ${cpu.physicalCores ?? '?'} physical / ${cpu.logicalCores} logical${frequency}`,
  );
  lines.push(`Memory: ${gb(memory.used)}/${gb(memory.total)} GB (${memory.percent.toFixed(1)}%)`);
  lines.push(`Network: ${network.hostname} ${network.ipAddress} [${network.macAddress}]`);

  for (const [device, disk] of Object.entries(hardware.disks)) {
    lines.push(`Disk ${device} on ${disk.mountpoint} (${disk.filesystem}): ${disk.percent.toFixed(1)}% of ${gb(disk.total)} GB`);
  }

  lines.push(`Processes: ${process.runningProcesses.length} listed / ${process.totalProcesses} total`);
  const top = [...process.runningProcesses].sort((a, b) => b.memoryPercent - a.memoryPercent).slice(0, topN);
  for (const p of top) {
    lines.push(`  ${String(p.pid).padStart(7)} ${p.memoryPercent.toFixed(1).padStart(5)}%  ${p.username || '-'}  ${p.name}`);
  }

  return lines;
}

/** Logs each snapshot, failure notification and auto-refresh change */
export class ConsolePresenter {
  private unsubscribe: (() => void) | null = null;
  private lastAutoRefresh: boolean | null = null;

  constructor(
    private readonly scheduler: RefreshScheduler,
    private readonly topN: number = 20,
  ) {}

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.scheduler.subscribe({
      onSnapshot: (snapshot) => this.showSnapshot(snapshot),
      onFailure: (failure) => this.showFailure(failure),
      onStateChange: (state) => this.showState(state),
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private showSnapshot(snapshot: SystemSnapshot): void {
    log.info(`\n${formatSnapshotSummary(snapshot, this.topN).join('\n')}`);
  }

  private showFailure(failure: CollectionFailure): void {
    const lastGood = this.scheduler.getLastSnapshot();
    log.warn(
      `Error refreshing data: ${failure.message}` + (lastGood ? ` (showing data from ${lastGood.timestamp})` : ''),
    );
  }

  private showState(state: SchedulerState): void {
    if (state.autoRefresh === this.lastAutoRefresh) return;
    this.lastAutoRefresh = state.autoRefresh;
    log.info(`Auto-refresh: ${state.autoRefresh ? 'ON' : 'OFF'} (press t to toggle)`);
  }
}
