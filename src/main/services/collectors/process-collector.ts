import type { ProcessInfo, ProcessSnapshot } from '../../../shared/types/system';
import { CollectorError } from '../../../shared/types/errors';
import { createLogger } from '../logger';
import type { ProcessHandle, ProcessSource } from '../host/types';
import { attempt, OmissionTally } from './omission';

const log = createLogger('ProcessCollector');

/**
 * Two passes: a PID count, then a per-process detail read. Processes churn
 * between the passes, so totalProcesses and runningProcesses.length may differ.
 */
export class ProcessCollector {
  constructor(private readonly source: ProcessSource) {}

  async collect(): Promise<ProcessSnapshot> {
    let totalProcesses: number;
    let handles: ProcessHandle[];
    try {
      totalProcesses = (await this.source.listPids()).length;
      handles = await this.source.enumerate();
    } catch (error) {
      throw CollectorError.wrap('process', error);
    }

    const runningProcesses: ProcessInfo[] = [];
    const skipped = new OmissionTally();

    for (const handle of handles) {
      const result = await attempt(() => handle.read());
      if (!result.ok) {
        skipped.add(result.reason);
        continue;
      }
      if (result.value.zombie) {
        skipped.add('zombie');
        continue;
      }
      const { pid, name, username, memoryPercent } = result.value;
      runningProcesses.push({ pid, name, username: username ?? '', memoryPercent });
    }

    skipped.report(log, 'processes');
    return { totalProcesses, runningProcesses };
  }
}
