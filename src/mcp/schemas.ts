/**
 * MCP Tool Schemas
 * Zod schemas for all MCP tool parameters
 */

import { z } from 'zod';
import { hexValueSchema, singleLineSchema } from '../batch/descriptors.js';

// Reset schema
export const resetSchema = z.object({
  mode: z.enum(['halt', 'run']).optional().default('halt').describe('halt: reset and stay halted; run: reset and run'),
});

// Erase flash schema
export const eraseFlashSchema = z.object({
  confirm: z.literal(true).describe('Must be true; erasing flash cannot be undone'),
});

// Flash schema
export const flashSchema = z.object({
  path: singleLineSchema.describe('Path to the firmware image'),
  address: hexValueSchema.optional().describe('Load address, e.g. "0x08000000" (default 0x08000000)'),
});

// Verify schema
export const verifySchema = z.object({
  path: singleLineSchema.describe('Path to the firmware image'),
  address: hexValueSchema.optional().describe('Address offset for verification'),
});

// Read memory schema
export const readMemorySchema = z.object({
  address: hexValueSchema.describe('Start address, e.g. "0x20000000"'),
  count: z.number().int().positive().optional().default(1).describe('Number of 32-bit words to read'),
});

// Write memory schema
export const writeMemorySchema = z.object({
  address: hexValueSchema.describe('Target address'),
  value: hexValueSchema.describe('32-bit value to write'),
});

// Custom command schema
export const customCommandSchema = z.object({
  command: singleLineSchema.describe('Raw OpenOCD console command'),
});

// Run batch schema (exactly one of commands/file, checked by the tool)
export const runBatchSchema = z.object({
  commands: z.array(z.unknown()).optional().describe('Ordered command descriptors, e.g. [{"type":"halt"}]'),
  file: singleLineSchema.optional().describe('Path to a JSON batch file'),
});

// Type exports
export type ResetParams = z.infer<typeof resetSchema>;
export type EraseFlashParams = z.infer<typeof eraseFlashSchema>;
export type FlashParams = z.infer<typeof flashSchema>;
export type VerifyParams = z.infer<typeof verifySchema>;
export type ReadMemoryParams = z.infer<typeof readMemorySchema>;
export type WriteMemoryParams = z.infer<typeof writeMemorySchema>;
export type CustomCommandParams = z.infer<typeof customCommandSchema>;
export type RunBatchParams = z.infer<typeof runBatchSchema>;
