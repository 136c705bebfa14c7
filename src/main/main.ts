#!/usr/bin/env node
/**
 * hostwatch entry point: live host telemetry in the terminal.
 *
 * Keys: r refresh now · t toggle auto-refresh · e export last result · q quit
 * SIGHUP reloads hostwatch.config.json and HOSTWATCH_* overrides.
 */

import * as readline from 'readline';
import { ServiceContainer } from './services/service-container';
import { createLogger } from './services/logger';

const log = createLogger('Main');

async function main(): Promise<void> {
  const container = new ServiceContainer();
  container.init();

  const config = container.get('config');
  const scheduler = container.get('scheduler');
  const exporter = container.get('exporter');

  let quitting = false;
  const quit = async (): Promise<void> => {
    if (quitting) return;
    quitting = true;
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    await container.shutdown();
  };

  const exportLast = async (): Promise<void> => {
    const result = scheduler.getLastResult();
    if (!result) {
      log.warn('Nothing to export yet');
      return;
    }
    try {
      await exporter.exportResult(result);
    } catch (err) {
      log.error('Export failed:', err);
    }
  };

  readline.emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  process.stdin.on('keypress', (_str: string | undefined, key: readline.Key | undefined) => {
    if (!key) return;
    if (key.name === 'q' || (key.ctrl && key.name === 'c')) {
      void quit();
    } else if (key.name === 'r') {
      void scheduler.triggerManualRefresh();
    } else if (key.name === 't') {
      scheduler.toggleAutoRefresh();
    } else if (key.name === 'e') {
      void exportLast();
    }
  });
  process.on('SIGTERM', () => void quit());
  process.on('SIGHUP', () => {
    if (!quitting) config.reload();
  });

  container.get('presenter').attach();
  scheduler.start();
  log.info("Press 'q' to quit, 'r' to refresh, 't' to toggle auto-refresh, 'e' to export");
}

main().catch((err) => {
  log.error('Fatal startup error:', err);
  process.exitCode = 1;
});
