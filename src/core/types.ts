/**
 * Core Types for one-inventory
 *
 * Raw OpenNebula payload shapes and the canonical VM record built from them.
 */

import type { LcmStateName, VmStateName } from './states.js';

// =============================================================================
// Raw payloads
// =============================================================================

/**
 * A value inside a parsed OpenNebula XML document.
 *
 * Leaves are always strings; repeated elements become arrays.
 */
export type RawValue = string | RawObject | RawValue[];

/**
 * A parsed OpenNebula XML element with child elements keyed by tag name
 * (uppercase, as sent by oned).
 */
export interface RawObject {
  [key: string]: RawValue;
}

/**
 * Flat, lower-cased attribute map produced by the normalizer
 */
export type FlatAttributes = Record<string, string>;

// =============================================================================
// VM record
// =============================================================================

/**
 * Canonical per-VM record.
 *
 * Field names are the host variable names, so they stay snake_case.
 */
export interface VmRecord {
  id: number;
  name: string;
  state: VmStateName;
  lcm_state: LcmStateName;
  /** Hypervisor-level identifier, may be empty */
  deploy_id: string;
  /** Epoch seconds */
  start_timestamp: number;
  /** Only set when the source template still exists */
  template_id?: number;
  template?: string;
  /** Normalized NICs in the order oned reports them */
  nic: FlatAttributes[];
  /** Network id -> DNS domain, only for networks that declare one */
  network_id_domain_map: Record<string, string>;
  user_attributes?: FlatAttributes;
}

/**
 * Hostname policy
 */
export type HostnamePreference = 'fqdn' | 'name';

export const HOSTNAME_PREFERENCES: readonly HostnamePreference[] = ['fqdn', 'name'];

/**
 * Narrow an arbitrary value to a hostname policy.
 */
export function isHostnamePreference(value: unknown): value is HostnamePreference {
  return value === 'fqdn' || value === 'name';
}

/**
 * Check whether a raw value is an element (as opposed to a leaf or a list).
 */
export function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
