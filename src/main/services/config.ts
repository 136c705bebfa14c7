/**
 * ConfigService: typed, validated configuration for the monitor.
 *
 * - Zod schema validation on load (corrupted JSON → safe defaults)
 * - HOSTWATCH_* environment overrides on top of the file
 * - Partial recovery: individually valid fields survive a failed document
 * - Typed get<K>/set<K> and onChange<K>() subscriptions
 * - reload() re-reads file and environment (SIGHUP in the CLI)
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger, setLogLevel } from './logger';
import { ErrorCode, TelemetryError } from '../../shared/types/errors';
import { ENV_OVERRIDES, MonitorConfigSchema } from '../../shared/schemas/config-schema';
import type { MonitorConfig } from '../../shared/schemas/config-schema';

export type { MonitorConfig } from '../../shared/schemas/config-schema';

const log = createLogger('Config');

const CONFIG_KEYS = MonitorConfigSchema.keyof().options;

export const DEFAULT_CONFIG_FILE = 'hostwatch.config.json';

export interface ConfigServiceOptions {
  /** Explicit file path; otherwise HOSTWATCH_CONFIG or ./hostwatch.config.json */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

type ChangeCallback<K extends keyof MonitorConfig> = (newVal: MonitorConfig[K], oldVal: MonitorConfig[K]) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigService {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private config: MonitorConfig;

  /** Per-key listeners; each receives the config as it was before the change */
  private keyListeners = new Map<keyof MonitorConfig, Set<(previous: MonitorConfig) => void>>();

  constructor(options: ConfigServiceOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = path.resolve(options.configPath ?? this.env.HOSTWATCH_CONFIG ?? DEFAULT_CONFIG_FILE);
    this.config = this.loadConfig(this.env);
    setLogLevel(this.config.logLevel);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  // ────────────── Load ──────────────

  private loadConfig(env: NodeJS.ProcessEnv): MonitorConfig {
    let raw: Record<string, unknown> = {};

    try {
      if (fs.existsSync(this.configPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
        if (isRecord(parsed)) {
          raw = parsed;
        } else {
          log.warn(`Config file ${this.configPath} is not a JSON object, using defaults`);
        }
      }
    } catch (error) {
      const wrapped = TelemetryError.from(error, ErrorCode.CONFIG_LOAD_ERROR, { path: this.configPath });
      log.error('Failed to read config file, using defaults:', wrapped.message);
    }

    for (const override of ENV_OVERRIDES) {
      const value = env[override.env];
      if (value !== undefined && value !== '') {
        raw[override.key] = override.parse(value);
      }
    }

    const result = MonitorConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    log.warn('Config validation failed, keeping valid fields only. Issues:', result.error.issues);
    return MonitorConfigSchema.parse(this.pickValidFields(raw));
  }

  /** Fields of raw that pass their own field schema */
  private pickValidFields(raw: Record<string, unknown>): Record<string, unknown> {
    const recovered: Record<string, unknown> = {};
    for (const [key, fieldSchema] of Object.entries(MonitorConfigSchema.shape)) {
      if (key in raw && fieldSchema.safeParse(raw[key]).success) {
        recovered[key] = raw[key];
      }
    }
    return recovered;
  }

  /**
   * Re-read the config file and environment. Listeners of every key whose
   * value changed are notified. Returns the changed keys.
   */
  reload(): Array<keyof MonitorConfig> {
    const previous = this.config;
    const next = this.loadConfig(this.env);
    const changed = CONFIG_KEYS.filter((key) => previous[key] !== next[key]);

    this.config = next;
    setLogLevel(next.logLevel);
    for (const key of changed) this.notifyChange(key, previous);
    log.info(changed.length > 0 ? `Reloaded, changed: ${changed.join(', ')}` : 'Reloaded, no changes');
    return changed;
  }

  // ────────────── Typed accessors ──────────────

  get<K extends keyof MonitorConfig>(key: K): MonitorConfig[K] {
    return this.config[key];
  }

  getAll(): MonitorConfig {
    return { ...this.config };
  }

  /**
   * Validate and apply a single value. Listeners of the key are notified
   * when the value actually changes.
   */
  set<K extends keyof MonitorConfig>(key: K, value: MonitorConfig[K]): void {
    const candidate = MonitorConfigSchema.safeParse({ ...this.config, [key]: value });
    if (!candidate.success) {
      throw new TelemetryError(`Invalid value for config key "${String(key)}"`, ErrorCode.CONFIG_VALIDATION_ERROR, {
        context: { key, issues: candidate.error.issues },
      });
    }

    const previous = this.config;
    if (previous[key] === candidate.data[key]) return;

    this.config = candidate.data;
    if (key === 'logLevel') setLogLevel(this.config.logLevel);
    this.notifyChange(key, previous);
  }

  // ────────────── Subscriptions ──────────────

  /**
   * Subscribe to changes of one key. Returns an unsubscribe function.
   *
   * @example
   * const unsub = config.onChange('refreshIntervalMs', (ms) => scheduler.setIntervalMs(ms));
   */
  onChange<K extends keyof MonitorConfig>(key: K, callback: ChangeCallback<K>): () => void {
    const listener = (previous: MonitorConfig): void => callback(this.config[key], previous[key]);
    let listeners = this.keyListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.keyListeners.set(key, listeners);
    }
    listeners.add(listener);
    return () => {
      this.keyListeners.get(key)?.delete(listener);
    };
  }

  private notifyChange(key: keyof MonitorConfig, previous: MonitorConfig): void {
    const listeners = this.keyListeners.get(key);
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener(previous);
      } catch (err) {
        log.error(`Config onChange listener error for key "${String(key)}":`, err);
      }
    }
  }

  shutdown(): void {
    this.keyListeners.clear();
  }
}
