/**
 * Operation Library
 * Debug operations built on the executor, each with its own precondition
 */

import { FileNotFoundError } from '../errors.js';
import type { HexValue } from '../types.js';
import { isFile } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import type { CommandExecutor } from './executor.js';

const logger = createLogger('Operations');

export const DEFAULT_FLASH_ADDRESS = 0x08000000;
export const ERASE_FLASH_COMMAND = 'flash erase_sector 0 0 last';

/**
 * 0x-prefixed, zero-padded to 8 lowercase hex digits; strings pass through
 */
export function formatHex(value: HexValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Expected a non-negative integer, got ${value}`);
  }
  return `0x${value.toString(16).padStart(8, '0')}`;
}

export class OperationLibrary {
  constructor(private readonly executor: CommandExecutor) {}

  async halt(): Promise<string> {
    logger.info('Halting MCU...');
    return this.report(await this.executor.send('halt', { checkHalt: false }));
  }

  async resetHalt(): Promise<string> {
    logger.info('Resetting and halting MCU...');
    return this.report(await this.executor.send('reset halt', { checkHalt: false }));
  }

  async resetRun(): Promise<string> {
    logger.info('Resetting and running MCU...');
    return this.report(await this.executor.send('reset run', { checkHalt: false }));
  }

  async eraseFlash(): Promise<string> {
    logger.warn('Erasing flash memory...');
    await this.executor.ensureHalted();
    return this.report(await this.executor.send(ERASE_FLASH_COMMAND));
  }

  async flash(firmwarePath: string, address?: HexValue): Promise<string> {
    await this.requireFile(firmwarePath);
    const addr = formatHex(address ?? DEFAULT_FLASH_ADDRESS);
    logger.info(`Flashing firmware: ${firmwarePath} at address ${addr}`);
    await this.executor.ensureHalted();
    return this.report(await this.executor.send(`program ${firmwarePath} ${addr}`));
  }

  async verify(firmwarePath: string, address?: HexValue): Promise<string> {
    await this.requireFile(firmwarePath);
    let command = `verify_image ${firmwarePath}`;
    if (address !== undefined) {
      const addr = formatHex(address);
      command += ` ${addr}`;
      logger.info(`Verifying firmware: ${firmwarePath} at address ${addr}`);
    } else {
      logger.info(`Verifying firmware: ${firmwarePath}`);
    }
    await this.executor.ensureHalted();
    return this.report(await this.executor.send(command));
  }

  async readMemory(address: HexValue, count: number = 1): Promise<string> {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new RangeError(`Word count must be a positive integer, got ${count}`);
    }
    const addr = formatHex(address);
    logger.info(`Reading memory at ${addr} (count: ${count})...`);
    return this.report(await this.executor.send(`mdw ${addr} ${count}`));
  }

  async writeMemory(address: HexValue, value: HexValue): Promise<string> {
    const addr = formatHex(address);
    const val = formatHex(value);
    logger.info(`Writing ${val} to address ${addr}...`);
    await this.executor.ensureHalted();
    return this.report(await this.executor.send(`mww ${addr} ${val}`));
  }

  async targetInfo(): Promise<string> {
    logger.info('Getting target information...');
    return this.report(await this.executor.send('targets'));
  }

  async custom(command: string): Promise<string> {
    logger.info(`Sending command: ${command}`);
    return this.report(await this.executor.send(command));
  }

  // Checked before anything reaches the console
  private async requireFile(firmwarePath: string): Promise<void> {
    if (!(await isFile(firmwarePath))) {
      logger.error(`Firmware file '${firmwarePath}' not found`);
      throw new FileNotFoundError(firmwarePath);
    }
  }

  private report(response: string): string {
    if (response) {
      logger.info(response);
    }
    return response;
  }
}
