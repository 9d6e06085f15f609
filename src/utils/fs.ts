/**
 * File System Utilities
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from './logger.js';

const logger = createLogger('FS');

/**
 * Check if a path exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that a path exists and is a regular file
 */
export async function isFile(target: string): Promise<boolean> {
  try {
    const stat = await fs.stat(target);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON file. Missing files and parse errors are thrown.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const resolved = path.resolve(filePath);
  const content = await fs.readFile(resolved, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (e) {
    logger.warn('Failed to parse JSON file', { filePath: resolved, error: String(e) });
    throw new Error(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
}
