/**
 * Zod schema for hostwatch configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';

export const MonitorConfigSchema = z.object({
  // ── Refresh loop ──
  refreshIntervalMs: z.number().int().positive().default(5000),
  autoRefresh: z.boolean().default(true),
  refreshOnStart: z.boolean().default(true),

  // ── Collection ──
  /** Blocking window for the CPU usage sample */
  cpuSampleMs: z.number().int().nonnegative().default(1000),

  // ── Output ──
  exportPath: z.string().min(1).default('system_data.json'),
  topProcessCount: z.number().int().positive().default(20),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/** Full config after parsing (defaults applied, all fields present) */
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

/** Environment variables that override file values, with their parsers */
export const ENV_OVERRIDES: ReadonlyArray<{ env: string; key: keyof MonitorConfig; parse: (raw: string) => unknown }> = [
  { env: 'HOSTWATCH_REFRESH_INTERVAL_MS', key: 'refreshIntervalMs', parse: Number },
  { env: 'HOSTWATCH_CPU_SAMPLE_MS', key: 'cpuSampleMs', parse: Number },
  { env: 'HOSTWATCH_AUTO_REFRESH', key: 'autoRefresh', parse: (raw) => raw === 'true' || raw === '1' },
  { env: 'HOSTWATCH_EXPORT_PATH', key: 'exportPath', parse: (raw) => raw },
  { env: 'HOSTWATCH_LOG_LEVEL', key: 'logLevel', parse: (raw) => raw },
];
