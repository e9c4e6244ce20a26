/**
 * Unit tests for the CLI output layer
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { buildHostRows, formatValue, OutputFormatter } from '../../../src/cli/output.js';
import { Inventory } from '../../../src/core/inventory.js';
import type { InventoryRun } from '../../../src/core/source.js';
import type { ResolvedInventoryConfig } from '../../../src/config/types.js';

const config: ResolvedInventoryConfig = {
  configPath: '/srv/ansible/lab.one.yaml',
  url: 'http://one.example.test:2633/RPC2',
  username: 'tester',
  password: 'test-secret',
  hostnamePreference: 'fqdn',
  timeout: 30000,
  cache: { enabled: false, plugin: 'jsonfile', connection: '/srv/ansible/.one-inventory/cache', timeout: 3600 },
  strict: false,
  constructed: { compose: {}, groups: {}, keyed_groups: [] },
};

function createRun(): InventoryRun {
  const inventory = new Inventory();
  inventory.addHost('web1.corp.local');
  inventory.setVariable('web1.corp.local', 'id', 5);
  inventory.setVariable('web1.corp.local', 'state', 'active');
  inventory.setVariable('web1.corp.local', 'lcm_state', 'running');
  inventory.addHostToGroup('web1.corp.local', 'role_web');
  inventory.addHostToGroup('web1.corp.local', 'running');
  inventory.addHost('db1');
  inventory.setVariable('db1', 'id', 6);

  return {
    inventory,
    config,
    records: [],
    hostnames: ['web1.corp.local', 'db1'],
    cacheKey: 'one_inventory_00000000',
    fromCache: false,
  };
}

describe('buildHostRows', () => {
  it('should list hosts with their state and groups', () => {
    assert.deepStrictEqual(buildHostRows(createRun()), [
      { hostname: 'web1.corp.local', id: '5', state: 'active', lcmState: 'running', groups: 'role_web,running' },
      { hostname: 'db1', id: '6', state: '', lcmState: '', groups: '-' },
    ]);
  });
});

describe('formatValue', () => {
  it('should render variables on one line', () => {
    assert.strictEqual(formatValue('web'), 'web');
    assert.strictEqual(formatValue(5), '5');
    assert.strictEqual(formatValue(undefined), '');
    assert.strictEqual(formatValue([{ network_id: '2' }]), '[{"network_id":"2"}]');
  });
});

describe('OutputFormatter', () => {
  it('should start in a successful state', () => {
    const output = new OutputFormatter('list', { json: true });

    assert.strictEqual(output.isJson(), true);
    assert.deepStrictEqual(output.getResult(), { success: true, command: 'list' });
    assert.strictEqual(output.getExitCode(), 0);
  });

  it('should record validation errors for JSON output', () => {
    const output = new OutputFormatter('validate', { json: true });

    output.validationError([{ path: '/one_timeout', message: 'must be >= 1' }]);

    assert.strictEqual(output.getExitCode(), 1);
    assert.deepStrictEqual(output.getResult().error, {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      suggestion: undefined,
      details: { errors: [{ path: '/one_timeout', message: 'must be >= 1' }] },
    });
  });

  it('should summarize a valid configuration', () => {
    const output = new OutputFormatter('validate', { json: true });

    output.validationSuccess(config.configPath, config.url, { compose: 1, groups: 0, keyed_groups: 2 });

    assert.deepStrictEqual(output.getResult(), {
      success: true,
      command: 'validate',
      url: 'http://one.example.test:2633/RPC2',
      summary: { compose: 1, groups: 0, keyed_groups: 2 },
    });
  });
});
