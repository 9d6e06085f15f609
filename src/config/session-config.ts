/**
 * Session Configuration Service
 * Handles loading/saving session config with immutable snapshots
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { SessionConfig } from '../types.js';
import { DEFAULT_INTERFACE_CONFIG } from './targets.js';
import { pathExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SessionConfig');

export const PROJECT_ROOT = process.cwd();
export const CONFIG_DIR = path.resolve(PROJECT_ROOT, '.openocd-session');
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

// Substrings that mark a console response as failed (lowercase match)
export const DEFAULT_FAILURE_MARKERS: readonly string[] = Object.freeze([
  'failed',
  'error',
  'target not halted',
  'cannot',
  'invalid',
]);

export const DEFAULT_CONFIG: SessionConfig = {
  binary: 'openocd',
  host: 'localhost',
  port: 4444,
  interfaceConfig: DEFAULT_INTERFACE_CONFIG,
  maxRetries: 3,
  failureMarkers: [...DEFAULT_FAILURE_MARKERS],
  bufferStrategy: 'discard',
  startupSettleMs: 2000,
  stopTimeoutMs: 5000,
  connectTimeoutMs: 5000,
  bannerTimeoutMs: 2000,
  readTimeoutMs: 5000,
  retryBackoffMs: 500,
  haltSettleMs: 500,
  reconnectDelayMs: 1000,
};

const durationSchema = z.number().int().nonnegative();

export const sessionConfigFileSchema = z
  .object({
    binary: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    interfaceConfig: z.string().min(1),
    targetConfig: z.string().min(1),
    maxRetries: z.number().int().min(1),
    failureMarkers: z.array(z.string().min(1)),
    bufferStrategy: z.enum(['discard', 'preserve']),
    startupSettleMs: durationSchema,
    stopTimeoutMs: durationSchema,
    connectTimeoutMs: durationSchema,
    bannerTimeoutMs: durationSchema,
    readTimeoutMs: durationSchema,
    retryBackoffMs: durationSchema,
    haltSettleMs: durationSchema,
    reconnectDelayMs: durationSchema,
  })
  .partial();

export type SessionConfigOverrides = z.infer<typeof sessionConfigFileSchema>;

/**
 * Environment overrides, applied on top of the file
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): SessionConfigOverrides {
  const overrides: SessionConfigOverrides = {};
  if (env.OPENOCD_BIN) {
    overrides.binary = env.OPENOCD_BIN;
  }
  if (env.OPENOCD_PORT) {
    const port = Number(env.OPENOCD_PORT);
    if (Number.isInteger(port) && port > 0 && port <= 65535) {
      overrides.port = port;
    } else {
      logger.warn('Ignoring invalid OPENOCD_PORT', { value: env.OPENOCD_PORT });
    }
  }
  return overrides;
}

/**
 * Session Configuration Service
 * Provides immutable snapshots of configuration
 */
export class SessionConfigService {
  private config: SessionConfig = { ...DEFAULT_CONFIG };

  constructor(
    private readonly configFile: string = CONFIG_FILE,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Load configuration from file
   */
  async load(): Promise<Readonly<SessionConfig>> {
    let fromFile: SessionConfigOverrides = {};
    try {
      if (await pathExists(this.configFile)) {
        const content = await fs.readFile(this.configFile, 'utf-8');
        const parsed = sessionConfigFileSchema.safeParse(JSON.parse(content));
        if (parsed.success) {
          fromFile = parsed.data;
          logger.info('Configuration loaded', { file: this.configFile });
        } else {
          logger.error('Invalid config file, using defaults', {
            file: this.configFile,
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          });
        }
      } else {
        logger.info('Using default configuration');
      }
    } catch (e) {
      logger.error('Failed to load config, using defaults', { error: String(e) });
    }
    this.config = { ...DEFAULT_CONFIG, ...fromFile, ...readEnvOverrides(this.env) };
    return this.getSnapshot();
  }

  /**
   * Get immutable snapshot of current configuration
   */
  getSnapshot(): Readonly<SessionConfig> {
    return Object.freeze({ ...this.config, failureMarkers: [...this.config.failureMarkers] });
  }

  /**
   * Apply overrides for this run without persisting them
   */
  apply(partial: SessionConfigOverrides): Readonly<SessionConfig> {
    this.config = { ...this.config, ...sessionConfigFileSchema.parse(partial) };
    return this.getSnapshot();
  }
}

// Singleton instance
export const sessionConfigService = new SessionConfigService();
