/**
 * Target menu: vendor/family identifiers mapped to OpenOCD config files
 */

import type { TargetDefinition } from '../types.js';

export const DEFAULT_INTERFACE_CONFIG = 'interface/stlink.cfg';

export const TARGETS: readonly TargetDefinition[] = Object.freeze([
  { id: 'l0', label: 'STM32L0', configFile: 'target/stm32l0.cfg' },
  { id: 'l4', label: 'STM32L4', configFile: 'target/stm32l4x.cfg' },
]);

export function findTarget(id: string): TargetDefinition | undefined {
  const key = id.trim().toLowerCase();
  return TARGETS.find((target) => target.id === key);
}

export function resolveTarget(id: string): TargetDefinition {
  const target = findTarget(id);
  if (!target) {
    const known = TARGETS.map((t) => t.id).join(', ');
    throw new Error(`Invalid target selection: ${id} (expected one of ${known})`);
  }
  return target;
}
