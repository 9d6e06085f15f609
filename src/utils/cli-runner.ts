/**
 * OpenOCD CLI Runner
 * One-shot openocd invocations (version probe); the long-lived server
 * process is owned by ProcessSupervisor.
 */

import { execa } from 'execa';
import * as fsSync from 'fs';
import type { CliRunResult } from '../types.js';
import { createLogger } from './logger.js';

const logger = createLogger('CLIRunner');

const VERSION_PATTERN = /Open On-Chip Debugger\s+v?([\w.+-]+)/i;

/**
 * Resolve openocd executable path
 */
export function resolveOpenOcdExecutable(configured?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (env.OPENOCD_BIN && fsSync.existsSync(env.OPENOCD_BIN)) {
    return env.OPENOCD_BIN;
  }
  if (configured) {
    return configured;
  }
  return process.platform === 'win32' ? 'openocd.exe' : 'openocd';
}

/**
 * Pull the version number out of `openocd --version` output
 */
export function parseOpenOcdVersion(output: string): string | undefined {
  return VERSION_PATTERN.exec(output)?.[1];
}

export class OpenOcdCliRunner {
  constructor(private readonly cliPath: string = resolveOpenOcdExecutable()) {}

  getPath(): string {
    return this.cliPath;
  }

  /**
   * Run openocd with the given arguments and wait for it to exit
   */
  async run(args: string[], options: { cwd?: string; timeoutMs?: number } = {}): Promise<CliRunResult> {
    logger.debug('Running openocd', { args, cwd: options.cwd });

    try {
      const result = await execa(this.cliPath, args, {
        cwd: options.cwd,
        reject: false,
        timeout: options.timeoutMs,
      });

      return {
        exitCode: result.exitCode ?? 1,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('openocd execution failed', { error: message, args });
      return { exitCode: 1, stdout: '', stderr: message };
    }
  }

  /**
   * Get openocd version (printed on stderr by openocd)
   */
  async getVersion(): Promise<{ ok: boolean; version?: string; error?: string }> {
    const result = await this.run(['--version'], { timeoutMs: 10_000 });
    const combined = `${result.stderr}\n${result.stdout}`;
    if (result.exitCode !== 0) {
      return { ok: false, error: result.stderr.trim() || `exit code ${result.exitCode}` };
    }
    return { ok: true, version: parseOpenOcdVersion(combined) ?? combined.trim().split('\n')[0] };
  }
}
