/**
 * VM Lifecycle States
 *
 * Integer codes reported by oned mapped to closed sets of state names.
 * Codes missing from the tables are rejected rather than coerced.
 */

import { UnknownStateError } from './errors.js';
import lcmStateTable from './lcm-states.json' with { type: 'json' };

/**
 * Primary VM state names
 */
export type VmStateName =
  | 'init'
  | 'pending'
  | 'hold'
  | 'active'
  | 'stopped'
  | 'suspended'
  | 'done'
  | 'poweroff'
  | 'undeployed'
  | 'cloning'
  | 'cloning_failure';

/**
 * Lower-cased LCM sub-state name, e.g. `running` or `lcm_init`
 */
export type LcmStateName = string;

/**
 * Primary state table. Code 7 is reserved by OpenNebula and has no entry.
 */
export const VM_STATES: ReadonlyMap<number, VmStateName> = new Map<number, VmStateName>([
  [0, 'init'],
  [1, 'pending'],
  [2, 'hold'],
  [3, 'active'],
  [4, 'stopped'],
  [5, 'suspended'],
  [6, 'done'],
  [8, 'poweroff'],
  [9, 'undeployed'],
  [10, 'cloning'],
  [11, 'cloning_failure'],
]);

/**
 * LCM sub-state table, loaded from lcm-states.json
 */
export const LCM_STATES: ReadonlyMap<number, LcmStateName> = new Map(
  Object.entries(lcmStateTable).map(([code, name]): [number, LcmStateName] => [
    Number(code),
    name,
  ])
);

/**
 * States after which the VM will not come back without operator action.
 * Recorded for reference only; nothing in the pipeline acts on it.
 */
export const TERMINAL_STATES: ReadonlySet<VmStateName> = new Set<VmStateName>([
  'done',
  'cloning_failure',
]);

/**
 * Parse a raw code. Only plain non-negative integers are accepted.
 */
function parseCode(raw: string | number): number | undefined {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw >= 0 ? raw : undefined;
  }
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

/**
 * Map a raw `STATE` value to its name.
 *
 * @throws UnknownStateError for codes outside the table
 */
export function toVmState(raw: string | number, vmName?: string): VmStateName {
  const code = parseCode(raw);
  const name = code === undefined ? undefined : VM_STATES.get(code);
  if (name === undefined) {
    throw new UnknownStateError('STATE', String(raw), vmName);
  }
  return name;
}

/**
 * Map a raw `LCM_STATE` value to its name.
 *
 * @throws UnknownStateError for codes outside the table
 */
export function toLcmState(raw: string | number, vmName?: string): LcmStateName {
  const code = parseCode(raw);
  const name = code === undefined ? undefined : LCM_STATES.get(code);
  if (name === undefined) {
    throw new UnknownStateError('LCM_STATE', String(raw), vmName);
  }
  return name;
}

export function isTerminalState(state: VmStateName): boolean {
  return TERMINAL_STATES.has(state);
}
