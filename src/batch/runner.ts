/**
 * Batch Runner
 * Runs descriptors in order; the first failure stops the batch and triggers
 * a best-effort flash erase so the target is not left half-programmed.
 */

import { OpenOcdError, errorMessage } from '../errors.js';
import type { OperationLibrary } from '../openocd/operations.js';
import type { BatchReport, SafetyEraseOutcome } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { type CommandDescriptor, describeDescriptor, parseDescriptor } from './descriptors.js';

const logger = createLogger('Batch');

export class BatchRunner {
  constructor(private readonly operations: OperationLibrary) {}

  /**
   * Exit code: 0 when every descriptor succeeded, 1 otherwise
   */
  async runBatch(descriptors: readonly unknown[]): Promise<number> {
    const report = await this.execute(descriptors);
    return report.exitCode;
  }

  async execute(descriptors: readonly unknown[]): Promise<BatchReport> {
    const started = Date.now();
    const total = descriptors.length;
    logger.info(`Executing ${total} command(s)`);

    for (let index = 0; index < total; index++) {
      try {
        const descriptor = parseDescriptor(descriptors[index], index);
        logger.info(`[${index + 1}/${total}] ${describeDescriptor(descriptor)}`);
        await this.dispatch(descriptor);
      } catch (error) {
        const skipped = total - index - 1;
        logger.error(`Command ${index + 1}/${total} failed: ${errorMessage(error)}`);
        if (skipped > 0) {
          logger.warn(`Skipping ${skipped} remaining command(s)`);
        }
        const safetyErase = await this.safetyErase();
        return {
          exitCode: 1,
          total,
          completed: index,
          failedIndex: index,
          skipped,
          error: {
            code: error instanceof OpenOcdError ? error.code : error instanceof Error ? error.name : 'error',
            message: errorMessage(error),
          },
          safetyErase,
          durationMs: Date.now() - started,
        };
      }
    }

    logger.info('All commands completed successfully');
    return {
      exitCode: 0,
      total,
      completed: total,
      skipped: 0,
      safetyErase: 'not_attempted',
      durationMs: Date.now() - started,
    };
  }

  private async dispatch(descriptor: CommandDescriptor): Promise<string> {
    switch (descriptor.type) {
      case 'halt':
        return this.operations.halt();
      case 'reset_halt':
        return this.operations.resetHalt();
      case 'reset_run':
        return this.operations.resetRun();
      case 'erase_flash':
        return this.operations.eraseFlash();
      case 'flash':
        return this.operations.flash(descriptor.path, descriptor.address);
      case 'verify':
        return this.operations.verify(descriptor.path, descriptor.address);
      case 'read_memory':
        return this.operations.readMemory(descriptor.address, descriptor.count);
      case 'write_memory':
        return this.operations.writeMemory(descriptor.address, descriptor.value);
      case 'custom':
        return this.operations.custom(descriptor.command);
    }
  }

  // Best effort: the outcome is reported, never thrown
  private async safetyErase(): Promise<SafetyEraseOutcome> {
    logger.warn('Erasing flash as a safety measure after failure...');
    try {
      await this.operations.eraseFlash();
      return 'ok';
    } catch (error) {
      logger.error('Safety erase failed', { error: errorMessage(error) });
      return 'failed';
    }
  }
}
