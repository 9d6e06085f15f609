/**
 * Batch command descriptors
 * Zod schemas for the already-parsed descriptor list handed to the batch runner
 */

import { z } from 'zod';
import { InvalidDescriptorError, UnknownDescriptorError } from '../errors.js';
import { readJsonFile } from '../utils/fs.js';
import { formatHex } from '../openocd/operations.js';

// Text that ends up on the console command line
export const singleLineSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[^\r\n]*$/, 'must be a single line');

// Integer (formatted as 0x%08x) or pre-formatted string (passed through)
export const hexValueSchema = z.union([
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  singleLineSchema,
]);

const firmwarePathSchema = singleLineSchema;

export const haltDescriptorSchema = z.object({ type: z.literal('halt') });
export const resetHaltDescriptorSchema = z.object({ type: z.literal('reset_halt') });
export const resetRunDescriptorSchema = z.object({ type: z.literal('reset_run') });
export const eraseFlashDescriptorSchema = z.object({ type: z.literal('erase_flash') });

export const flashDescriptorSchema = z.object({
  type: z.literal('flash'),
  path: firmwarePathSchema,
  address: hexValueSchema.optional(),
});

export const verifyDescriptorSchema = z.object({
  type: z.literal('verify'),
  path: firmwarePathSchema,
  address: hexValueSchema.optional(),
});

export const readMemoryDescriptorSchema = z.object({
  type: z.literal('read_memory'),
  address: hexValueSchema,
  count: z.number().int().positive().optional().default(1),
});

export const writeMemoryDescriptorSchema = z.object({
  type: z.literal('write_memory'),
  address: hexValueSchema,
  value: hexValueSchema,
});

export const customDescriptorSchema = z.object({
  type: z.literal('custom'),
  command: singleLineSchema,
});

export const commandDescriptorSchema = z.discriminatedUnion('type', [
  haltDescriptorSchema,
  resetHaltDescriptorSchema,
  resetRunDescriptorSchema,
  eraseFlashDescriptorSchema,
  flashDescriptorSchema,
  verifyDescriptorSchema,
  readMemoryDescriptorSchema,
  writeMemoryDescriptorSchema,
  customDescriptorSchema,
]);

export type CommandDescriptor = z.infer<typeof commandDescriptorSchema>;
export type DescriptorType = CommandDescriptor['type'];

export const DESCRIPTOR_TYPES: readonly DescriptorType[] = [
  'halt',
  'reset_halt',
  'reset_run',
  'erase_flash',
  'flash',
  'verify',
  'read_memory',
  'write_memory',
  'custom',
];

function isDescriptorType(value: string): value is DescriptorType {
  return DESCRIPTOR_TYPES.some((type) => type === value);
}

/**
 * Validate one descriptor; `index` is its zero-based position in the batch
 */
export function parseDescriptor(raw: unknown, index: number): CommandDescriptor {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new InvalidDescriptorError(index, ['expected an object with a "type" field']);
  }
  const type: unknown = 'type' in raw ? raw.type : undefined;
  if (typeof type !== 'string') {
    throw new InvalidDescriptorError(index, ['missing "type" field']);
  }
  if (!isDescriptorType(type)) {
    throw new UnknownDescriptorError(type, index);
  }

  const parsed = commandDescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new InvalidDescriptorError(index, issues);
  }
  return parsed.data;
}

/**
 * One-line human description used in batch progress logs
 */
export function describeDescriptor(descriptor: CommandDescriptor): string {
  switch (descriptor.type) {
    case 'halt':
      return 'halt';
    case 'reset_halt':
      return 'reset halt';
    case 'reset_run':
      return 'reset run';
    case 'erase_flash':
      return 'erase flash';
    case 'flash':
      return descriptor.address === undefined
        ? `flash ${descriptor.path}`
        : `flash ${descriptor.path} @ ${formatHex(descriptor.address)}`;
    case 'verify':
      return descriptor.address === undefined
        ? `verify ${descriptor.path}`
        : `verify ${descriptor.path} @ ${formatHex(descriptor.address)}`;
    case 'read_memory':
      return `read ${descriptor.count} word(s) @ ${formatHex(descriptor.address)}`;
    case 'write_memory':
      return `write ${formatHex(descriptor.value)} @ ${formatHex(descriptor.address)}`;
    case 'custom':
      return `custom: ${descriptor.command}`;
  }
}

export const batchFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ commands: z.array(z.unknown()) }),
]);

/**
 * Read a JSON batch file: either an array or `{ "commands": [...] }`.
 * Entries are validated one by one when the runner reaches them.
 */
export async function loadBatchFile(filePath: string): Promise<unknown[]> {
  const content = await readJsonFile(filePath);
  const parsed = batchFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new Error(`Batch file ${filePath} must contain an array of commands or { "commands": [...] }`);
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.commands;
}
