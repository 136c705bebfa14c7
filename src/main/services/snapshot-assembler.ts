import type { SnapshotParts, SystemSnapshot } from '../../shared/types/system';

/** Walks every node, including the children of nodes that are already frozen */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Combine one cycle's category records into a frozen snapshot stamped with
 * the instant the cycle started.
 */
export function assembleSnapshot(capturedAt: Date, parts: SnapshotParts): SystemSnapshot {
  return deepFreeze({
    timestamp: capturedAt.toISOString(),
    platform: parts.platform,
    network: parts.network,
    hardware: parts.hardware,
    process: parts.process,
  });
}
