/**
 * Unit tests for the hostname resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { HostnameResolver } from '../../../src/core/hostname.js';
import { InvalidOptionError } from '../../../src/core/errors.js';
import type { VmRecord } from '../../../src/core/types.js';

function record(overrides: Partial<VmRecord> = {}): VmRecord {
  return {
    id: 5,
    name: 'web1',
    state: 'active',
    lcm_state: 'running',
    deploy_id: '',
    start_timestamp: 0,
    nic: [{ network_id: '2' }],
    network_id_domain_map: { '2': 'corp.local' },
    ...overrides,
  };
}

describe('HostnameResolver', () => {
  it('should append the domain of the first NIC network for fqdn', async () => {
    const resolver = new HostnameResolver();

    assert.strictEqual(await resolver.resolve(record(), 'fqdn'), 'web1.corp.local');
  });

  it('should strip trailing dots left in the domain map', async () => {
    const resolver = new HostnameResolver();
    const vm = record({ network_id_domain_map: { '2': 'corp.local.' } });

    assert.strictEqual(await resolver.resolve(vm, 'fqdn'), 'web1.corp.local');
  });

  it('should return the bare name for the name policy', async () => {
    const resolver = new HostnameResolver();

    assert.strictEqual(await resolver.resolve(record(), 'name'), 'web1');
  });

  it('should return the bare name for VMs without NICs', async () => {
    const resolver = new HostnameResolver();
    const vm = record({ nic: [], network_id_domain_map: {} });

    assert.strictEqual(await resolver.resolve(vm, 'fqdn'), 'web1');
    assert.strictEqual(await resolver.resolve(vm, 'name'), 'web1');
  });

  it('should only look at the first NIC', async () => {
    const resolver = new HostnameResolver();
    const vm = record({
      nic: [{ network_id: '1' }, { network_id: '2' }],
      network_id_domain_map: { '2': 'corp.local' },
    });

    assert.strictEqual(await resolver.resolve(vm, 'fqdn'), 'web1');
  });

  it('should consult the lookup once per network when the map has no entry', async () => {
    const asked: string[] = [];
    const resolver = new HostnameResolver({
      lookup: async (networkId) => {
        asked.push(networkId);
        return 'lab.example.';
      },
    });
    const vm = record({ network_id_domain_map: {} });

    assert.strictEqual(await resolver.resolve(vm, 'fqdn'), 'web1.lab.example');
    assert.strictEqual(await resolver.resolve({ ...vm, name: 'web2' }, 'fqdn'), 'web2.lab.example');
    assert.deepStrictEqual(asked, ['2']);
  });

  it('should not consult the lookup when the map has an entry', async () => {
    let called = false;
    const resolver = new HostnameResolver({
      lookup: async () => {
        called = true;
        return 'other.example';
      },
    });

    assert.strictEqual(await resolver.resolve(record(), 'fqdn'), 'web1.corp.local');
    assert.strictEqual(called, false);
  });

  it('should reject unrecognized policies', async () => {
    const resolver = new HostnameResolver();

    await assert.rejects(
      () => resolver.resolve(record(), 'ip'),
      (error: unknown) => {
        assert.ok(error instanceof InvalidOptionError);
        assert.strictEqual(error.option, 'one_hostname_preference');
        assert.strictEqual(error.value, 'ip');
        assert.strictEqual(error.message, 'Invalid value for option one_hostname_preference: ip');
        return true;
      }
    );
  });
});
