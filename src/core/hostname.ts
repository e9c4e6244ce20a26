/**
 * Hostname Resolver
 *
 * Derives the inventory hostname of a VM from the configured preference.
 */

import { InvalidOptionError } from './errors.js';
import { stripTrailingSeparator } from './builder.js';
import type { VmRecord } from './types.js';
import { HOSTNAME_PREFERENCES, isHostnamePreference } from './types.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';

/**
 * Domain lookup by network id, consulted when a record's domain map has
 * no entry for its first NIC's network
 */
export type NetworkDomainLookup = (networkId: string) => Promise<string | undefined>;

/**
 * Resolves hostnames for VM records.
 */
export class HostnameResolver {
  private readonly lookup?: NetworkDomainLookup;
  private readonly diagnostics: Diagnostics;
  private readonly looked = new Map<string, string | undefined>();

  constructor(options: { lookup?: NetworkDomainLookup; diagnostics?: Diagnostics } = {}) {
    this.lookup = options.lookup;
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
  }

  /**
   * Resolve the hostname of a VM.
   *
   * - VMs without NICs always get their bare name
   * - `name` returns the VM name
   * - `fqdn` returns `<name>.<domain>` using the first NIC's network, or
   *   the bare name when that network has no domain
   *
   * @param vm - VM record
   * @param policy - `fqdn` or `name`; anything else is rejected
   * @throws InvalidOptionError for an unrecognized policy
   */
  async resolve(vm: VmRecord, policy: unknown): Promise<string> {
    if (!isHostnamePreference(policy)) {
      throw new InvalidOptionError('one_hostname_preference', policy, HOSTNAME_PREFERENCES);
    }

    const [firstNic] = vm.nic;
    if (firstNic === undefined) {
      this.diagnostics.vvvv(`VM ${vm.name} doesn't have any NICs attached to it, using VM name`);
      return vm.name;
    }

    if (policy === 'name') {
      return vm.name;
    }

    const networkId = firstNic['network_id'];
    const domain = networkId === undefined ? undefined : await this.domainFor(vm, networkId);

    if (domain === undefined || domain.length === 0) {
      this.diagnostics.vvvv(`VM ${vm.name} first NIC doesn't have a domain configured, using VM name`);
      return vm.name;
    }
    return `${vm.name}.${domain}`;
  }

  private async domainFor(vm: VmRecord, networkId: string): Promise<string | undefined> {
    if (Object.prototype.hasOwnProperty.call(vm.network_id_domain_map, networkId)) {
      return stripTrailingSeparator(vm.network_id_domain_map[networkId] ?? '');
    }
    if (!this.lookup) {
      return undefined;
    }
    if (!this.looked.has(networkId)) {
      this.looked.set(networkId, await this.lookup(networkId));
    }
    const found = this.looked.get(networkId);
    return found === undefined ? undefined : stripTrailingSeparator(found);
  }
}
