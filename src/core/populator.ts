/**
 * Inventory Populator
 *
 * Registers every VM record as a host, copies the record fields into host
 * variables and applies the constructed rules.
 */

import type { CompositeVariableEvaluator, GroupMembershipEvaluator } from './constructed.js';
import type { HostnameResolver } from './hostname.js';
import type { HostVars, Inventory } from './inventory.js';
import type { HostnamePreference, VmRecord } from './types.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';

/**
 * Collaborators and settings for a populate pass
 */
export interface PopulatorOptions {
  inventory: Inventory;
  resolver: HostnameResolver;
  hostnamePreference: HostnamePreference;
  composer: CompositeVariableEvaluator;
  grouper: GroupMembershipEvaluator;
  /** Abort on rule evaluation errors instead of skipping the rule */
  strict: boolean;
  diagnostics?: Diagnostics;
}

/**
 * Populates an inventory from VM records.
 */
export class InventoryPopulator {
  private readonly diagnostics: Diagnostics;

  constructor(private readonly options: PopulatorOptions) {
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
  }

  /**
   * Add every record to the inventory, in order.
   *
   * Records that resolve to the same hostname share one host; the later
   * record's variables win.
   *
   * @returns Hostnames in record order
   */
  async populate(records: readonly VmRecord[]): Promise<string[]> {
    const { inventory, resolver, hostnamePreference, composer, grouper, strict } = this.options;
    const hostnames: string[] = [];

    for (const record of records) {
      const hostname = await resolver.resolve(record, hostnamePreference);

      if (inventory.hasHost(hostname)) {
        this.diagnostics.v(`Hostname ${hostname} is used by more than one VM, VM ${record.id} overrides it`);
      }
      inventory.addHost(hostname);

      const variables = recordVariables(record);
      for (const [name, value] of Object.entries(variables)) {
        inventory.setVariable(hostname, name, value);
      }

      composer.setCompositeVars(hostname, variables, strict);
      // Group rules see the composed variables too
      const withComposed = inventory.getHostVars(hostname) ?? variables;
      grouper.addToComposedGroups(hostname, withComposed, strict);
      grouper.addToKeyedGroups(hostname, withComposed, strict);

      hostnames.push(hostname);
    }

    return hostnames;
  }
}

/**
 * Host variables for a record: every present field under its own name.
 */
export function recordVariables(record: VmRecord): HostVars {
  const variables: HostVars = {};
  for (const [name, value] of Object.entries(record)) {
    if (value !== undefined) {
      variables[name] = value;
    }
  }
  return variables;
}
