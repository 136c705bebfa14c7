/**
 * Per-item outcomes inside a collector.
 *
 * A failing item (one disk, one process, one interface entry) becomes an
 * omission with a reason; it never fails the collector.
 */

import { ErrorCode, TelemetryError, toError } from '../../../shared/types/errors';
import type { Logger } from '../logger';

export type OmissionReason = 'vanished' | 'access-denied' | 'zombie' | 'malformed' | 'unavailable';

export type ItemResult<T> = { ok: true; value: T } | { ok: false; reason: OmissionReason; detail: string };

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function classifyOmission(error: unknown): OmissionReason {
  if (error instanceof TelemetryError && error.code === ErrorCode.MALFORMED_ENTRY) return 'malformed';
  switch (errnoCode(error)) {
    case 'ENOENT':
    case 'ESRCH':
      return 'vanished';
    case 'EACCES':
    case 'EPERM':
      return 'access-denied';
    default:
      return 'unavailable';
  }
}

export async function attempt<T>(read: () => Promise<T>): Promise<ItemResult<T>> {
  try {
    return { ok: true, value: await read() };
  } catch (error) {
    return { ok: false, reason: classifyOmission(error), detail: toError(error).message };
  }
}

/** Counts omissions per reason for a single debug line per pass */
export class OmissionTally {
  private counts = new Map<OmissionReason, number>();

  add(reason: OmissionReason): void {
    this.counts.set(reason, (this.counts.get(reason) ?? 0) + 1);
  }

  get size(): number {
    let total = 0;
    for (const count of this.counts.values()) total += count;
    return total;
  }

  report(log: Logger, what: string): void {
    if (this.size === 0) return;
    const parts = [...this.counts].map(([reason, count]) => `${reason}=${count}`);
    log.debug(`Omitted ${this.size} ${what} (${parts.join(', ')})`);
  }
}
