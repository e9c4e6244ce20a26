/**
 * VM Record Builder
 *
 * Turns raw VM elements from the pool into VmRecords, looking up the
 * source template and the DNS domain of every attached network.
 */

import { MalformedVmError, NotFoundError } from './errors.js';
import { normalize } from './normalize.js';
import { toLcmState, toVmState } from './states.js';
import type { FlatAttributes, RawObject, RawValue, VmRecord } from './types.js';
import { isRawObject } from './types.js';
import type { OneApi } from '../opennebula/types.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';

/**
 * Strip trailing dots from a DNS domain (`corp.local.` -> `corp.local`).
 */
export function stripTrailingSeparator(domain: string): string {
  return domain.replace(/\.+$/, '');
}

/**
 * Read a leaf value from an element, or undefined if it is not a string.
 */
function leaf(element: RawObject, key: string): string | undefined {
  const value = element[key];
  return typeof value === 'string' ? value : undefined;
}

function toInteger(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse the VM ID, which must be a plain non-negative integer.
 */
function toVmId(value: string | undefined, vmName: string): number {
  const trimmed = value?.trim();
  if (trimmed === undefined || !/^\d+$/.test(trimmed)) {
    throw new MalformedVmError('ID', value, vmName);
  }
  return Number(trimmed);
}

/**
 * Accept a single NIC element or a list of them.
 */
function toNicList(value: RawValue | undefined): RawObject[] {
  if (isRawObject(value)) return [value];
  if (Array.isArray(value)) return value.filter(isRawObject);
  return [];
}

/**
 * Look up the DNS domain declared by a virtual network.
 *
 * @param api - OpenNebula API
 * @param networkId - Network id as reported in the NIC
 * @returns Domain without trailing dots, or undefined when the network declares none
 * @throws NotFoundError if the network does not exist
 * @throws RemoteFailureError for any other failure
 */
export async function lookupNetworkDomain(
  api: OneApi,
  networkId: string
): Promise<string | undefined> {
  const id = Number.parseInt(networkId, 10);
  if (Number.isNaN(id)) {
    return undefined;
  }

  const network = await api.vnInfo(id);
  const template = network['TEMPLATE'];
  if (!isRawObject(template)) {
    return undefined;
  }

  const domain = leaf(template, 'DOMAIN');
  if (domain === undefined) {
    return undefined;
  }
  const stripped = stripTrailingSeparator(domain.trim());
  return stripped.length > 0 ? stripped : undefined;
}

/**
 * Builds VmRecords from raw pool entries.
 *
 * Every lookup is awaited before the next one starts; a VM with N NICs
 * costs one template lookup plus N network lookups.
 */
export class VmRecordBuilder {
  constructor(
    private readonly api: OneApi,
    private readonly diagnostics: Diagnostics = silentDiagnostics
  ) {}

  /**
   * List the pool and build a record for every VM, in pool order.
   */
  async query(): Promise<VmRecord[]> {
    const pool = await this.api.vmPoolInfoExtended();
    this.diagnostics.vv(`Retrieved ${pool.length} VM${pool.length === 1 ? '' : 's'} from the VM pool`);

    const records: VmRecord[] = [];
    for (const vm of pool) {
      records.push(await this.build(vm));
    }
    return records;
  }

  /**
   * Build one record.
   *
   * @param vm - Raw VM element
   * @throws MalformedVmError when the ID is missing or not an integer
   * @throws UnknownStateError for unrecognized STATE / LCM_STATE codes
   * @throws RemoteFailureError when a lookup fails for a reason other than a missing object
   */
  async build(vm: RawObject): Promise<VmRecord> {
    const name = leaf(vm, 'NAME') ?? '';

    const record: VmRecord = {
      id: toVmId(leaf(vm, 'ID'), name),
      name,
      state: toVmState(leaf(vm, 'STATE') ?? '', name),
      lcm_state: toLcmState(leaf(vm, 'LCM_STATE') ?? '', name),
      deploy_id: leaf(vm, 'DEPLOY_ID') ?? '',
      start_timestamp: toInteger(leaf(vm, 'STIME'), 0),
      nic: [],
      network_id_domain_map: {},
    };

    const template = vm['TEMPLATE'];
    if (isRawObject(template)) {
      await this.applyTemplate(record, template);
      await this.applyNics(record, template);
    }

    // An empty <USER_TEMPLATE/> parses as ''
    const userTemplate = vm['USER_TEMPLATE'];
    if (userTemplate !== undefined) {
      record.user_attributes = isRawObject(userTemplate) ? normalize(userTemplate) : {};
    }

    return record;
  }

  private async applyTemplate(record: VmRecord, template: RawObject): Promise<void> {
    const rawTemplateId = leaf(template, 'TEMPLATE_ID');
    if (rawTemplateId === undefined) {
      return;
    }

    const templateId = Number.parseInt(rawTemplateId, 10);
    if (Number.isNaN(templateId)) {
      this.diagnostics.vvv(`VM ${record.name} has a non-numeric TEMPLATE_ID ${rawTemplateId}, ignoring it`);
      return;
    }

    try {
      const info = await this.api.templateInfo(templateId);
      record.template_id = templateId;
      const templateName = leaf(info, 'NAME');
      if (templateName !== undefined) {
        record.template = templateName;
      }
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      this.diagnostics.vvv(
        `VM ${record.name} template ID ${templateId} does not exist, not retrieving it`
      );
    }
  }

  private async applyNics(record: VmRecord, template: RawObject): Promise<void> {
    for (const nic of toNicList(template['NIC'])) {
      const flat: FlatAttributes = normalize(nic);
      record.nic.push(flat);

      const networkId = leaf(nic, 'NETWORK_ID');
      if (networkId === undefined || networkId.length === 0) {
        continue;
      }

      const domain = await this.networkDomain(record.name, networkId);
      if (domain !== undefined) {
        record.network_id_domain_map[networkId] = domain;
      }
    }
  }

  private async networkDomain(vmName: string, networkId: string): Promise<string | undefined> {
    try {
      return await lookupNetworkDomain(this.api, networkId);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      this.diagnostics.vvv(`VM ${vmName} network ID ${networkId} does not exist, no domain recorded`);
      return undefined;
    }
  }
}
