/**
 * Pure parsers for procfs files and command output.
 */

import type { PartitionEntry } from './types';

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

// ─── Mounts ───

/** /proc/mounts escapes space, tab, newline and backslash as octal */
function decodeMountField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

/**
 * Parse /proc/mounts, keeping block devices only (device path starts with '/').
 */
export function parseProcMounts(text: string): PartitionEntry[] {
  const partitions: PartitionEntry[] = [];
  for (const line of lines(text)) {
    const [device, mountpoint, filesystem] = line.split(/\s+/);
    if (!device || !mountpoint || !filesystem || !device.startsWith('/')) continue;
    partitions.push({
      device: decodeMountField(device),
      mountpoint: decodeMountField(mountpoint),
      filesystem,
    });
  }
  return partitions;
}

/**
 * Parse BSD/macOS `mount` output:
 *   /dev/disk3s1s1 on / (apfs, sealed, local, read-only, journaled)
 */
export function parseMountOutput(output: string): PartitionEntry[] {
  const partitions: PartitionEntry[] = [];
  for (const line of lines(output)) {
    const match = line.match(/^(\/\S+) on (.+) \(([^,)]+)/);
    if (match) {
      partitions.push({ device: match[1], mountpoint: match[2], filesystem: match[3].trim() });
    }
  }
  return partitions;
}

// ─── Memory / CPU ───

/** /proc/meminfo → field name → bytes */
export function parseMeminfo(text: string): Map<string, number> {
  const fields = new Map<string, number>();
  for (const line of lines(text)) {
    const match = line.match(/^(\w+):\s+(\d+)(?:\s+kB)?$/);
    if (match) {
      const value = parseInt(match[2], 10);
      fields.set(match[1], line.endsWith('kB') ? value * 1024 : value);
    }
  }
  return fields;
}

/**
 * Count distinct (physical id, core id) pairs in /proc/cpuinfo.
 * Returns null when the file carries no topology (common on ARM).
 */
export function parseCpuinfoPhysicalCores(text: string): number | null {
  const cores = new Set<string>();
  for (const block of text.split(/\n\s*\n/)) {
    const physical = block.match(/^physical id\s*:\s*(\d+)/m);
    const core = block.match(/^core id\s*:\s*(\d+)/m);
    if (physical && core) cores.add(`${physical[1]}:${core[1]}`);
  }
  return cores.size > 0 ? cores.size : null;
}

// ─── Processes ───

/**
 * /proc/<pid>/stat: `pid (comm) state ...`. comm may itself contain spaces
 * and parentheses, so it runs to the last ')'.
 */
export function parseProcStat(text: string): { name: string; state: string } | null {
  const open = text.indexOf('(');
  const close = text.lastIndexOf(')');
  if (open === -1 || close <= open) return null;
  const state = text.slice(close + 1).trim().charAt(0);
  if (!state) return null;
  return { name: text.slice(open + 1, close), state };
}

/** Real UID and resident set size (bytes) from /proc/<pid>/status */
export function parseProcStatus(text: string): { uid: number | null; rssBytes: number } {
  const uid = text.match(/^Uid:\s+(\d+)/m);
  const rss = text.match(/^VmRSS:\s+(\d+)\s+kB/m);
  return {
    uid: uid ? parseInt(uid[1], 10) : null,
    rssBytes: rss ? parseInt(rss[1], 10) * 1024 : 0,
  };
}

/** /etc/passwd → uid → login name */
export function parsePasswd(text: string): Map<number, string> {
  const users = new Map<number, string>();
  for (const line of lines(text)) {
    if (line.startsWith('#')) continue;
    const [name, , uid] = line.split(':');
    const id = parseInt(uid ?? '', 10);
    if (name && Number.isFinite(id) && !users.has(id)) users.set(id, name);
  }
  return users;
}

export interface PsRow {
  pid: number;
  stat: string;
  rssBytes: number;
  user: string;
  name: string;
}

/**
 * One row of `ps -A -o pid=,stat=,rss=,user=,comm=`. The command column is
 * last and may contain spaces.
 */
export function parsePsRow(line: string): PsRow | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 5) return null;
  const pid = parseInt(parts[0], 10);
  const rssKb = parseInt(parts[2], 10);
  if (!Number.isFinite(pid) || !Number.isFinite(rssKb)) return null;
  const command = parts.slice(4).join(' ');
  return {
    pid,
    stat: parts[1],
    rssBytes: rssKb * 1024,
    user: parts[3],
    name: command.split('/').pop() || command,
  };
}

export function parsePidList(output: string): number[] {
  return lines(output)
    .map((l) => parseInt(l, 10))
    .filter((pid) => Number.isFinite(pid));
}

// ─── CSV (PowerShell ConvertTo-Csv) ───

/** Header row + records; every field is double-quoted by ConvertTo-Csv */
export function parseCsv(output: string): Record<string, string>[] {
  const rows = lines(output).map(splitCsvLine);
  const header = rows[0];
  if (!header) return [];
  return rows.slice(1).map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((column, i) => {
      record[column] = cells[i] ?? '';
    });
    return record;
  });
}

function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells;
}
