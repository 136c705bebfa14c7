import { exec } from 'child_process';
import { ErrorCode, TelemetryError } from '../../../shared/types/errors';

const EXEC_TIMEOUT_MS = 10_000;
const EXEC_MAX_BUFFER = 8 * 1024 * 1024; // process tables on busy hosts

/**
 * Run a shell command and resolve with its stdout.
 * Non-zero exits and timeouts reject with COMMAND_FAILED.
 */
export function execCommand(cmd: string): Promise<string> {
  return new Promise((resolve, reject) => {
    exec(cmd, { timeout: EXEC_TIMEOUT_MS, maxBuffer: EXEC_MAX_BUFFER }, (err, stdout) => {
      if (err) {
        reject(
          new TelemetryError(`Command failed: ${cmd}`, ErrorCode.COMMAND_FAILED, {
            originalError: err,
            context: { cmd },
          }),
        );
      } else {
        resolve(stdout);
      }
    });
  });
}

export function powershell(script: string): Promise<string> {
  return execCommand(`powershell -NoProfile -Command "${script}"`);
}
