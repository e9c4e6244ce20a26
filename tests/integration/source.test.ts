/**
 * Integration tests for the inventory pipeline
 *
 * Runs InventorySource end to end against a fake OpenNebula API, with the
 * cache written to a temporary directory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { access, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { getCacheKey } from '../../src/cache/manager.js';
import { InventorySource } from '../../src/core/source.js';
import { ConstructionError, RemoteFailureError, UnknownStateError } from '../../src/core/errors.js';
import type { RawObject } from '../../src/core/types.js';
import { FakeOneApi, networkWithDomain, RecordingDiagnostics } from '../helpers/fakes.js';

// =============================================================================
// Test Helpers
// =============================================================================

async function createTempDir(): Promise<string> {
  const dir = join(tmpdir(), `one-inventory-source-test-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

function createConfig(extra: string[] = []): string {
  return [
    'plugin: opennebula',
    'one_url: http://one.example.test:2633/RPC2',
    'one_username: tester',
    'one_password: test-secret',
    'cache_connection: ./cache',
    ...extra,
  ].join('\n');
}

const WEB1: RawObject = {
  ID: '5',
  NAME: 'web1',
  STATE: '3',
  LCM_STATE: '0',
  TEMPLATE: { NIC: { NETWORK_ID: '2' } },
};

const DB1: RawObject = {
  ID: '6',
  NAME: 'db1',
  STATE: '8',
  LCM_STATE: '0',
  TEMPLATE: { TEMPLATE_ID: '44' },
  USER_TEMPLATE: { ROLE: 'db' },
};

// =============================================================================
// Tests
// =============================================================================

describe('InventorySource', () => {
  let tempDir: string;
  let configPath: string;
  let api: FakeOneApi;
  let diagnostics: RecordingDiagnostics;

  function createSource(): InventorySource {
    return new InventorySource({ diagnostics, env: {}, createApi: () => api });
  }

  beforeEach(async () => {
    tempDir = await createTempDir();
    configPath = join(tempDir, 'lab.one.yaml');
    api = new FakeOneApi([WEB1], {}, { 2: networkWithDomain('corp.local.') });
    diagnostics = new RecordingDiagnostics();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('inventory contents', () => {
    it('should register a VM under its FQDN with its record as variables', async () => {
      // Arrange
      await writeFile(configPath, createConfig(), 'utf-8');

      // Act
      const run = await createSource().parse(configPath);

      // Assert
      assert.deepStrictEqual(run.hostnames, ['web1.corp.local']);
      assert.strictEqual(run.fromCache, false);
      assert.deepStrictEqual(run.inventory.toAnsibleJson(), {
        _meta: {
          hostvars: {
            'web1.corp.local': {
              id: 5,
              name: 'web1',
              state: 'active',
              lcm_state: 'lcm_init',
              deploy_id: '',
              start_timestamp: 0,
              nic: [{ network_id: '2' }],
              network_id_domain_map: { '2': 'corp.local' },
            },
          },
        },
        ungrouped: { hosts: ['web1.corp.local'] },
        all: { children: ['ungrouped'] },
      });
    });

    it('should continue without template fields when a template is gone', async () => {
      // Arrange
      await writeFile(configPath, createConfig(), 'utf-8');
      api.pool = [WEB1, DB1];

      // Act
      const run = await createSource().parse(configPath);

      // Assert
      assert.deepStrictEqual(run.hostnames, ['web1.corp.local', 'db1']);
      const vars = run.inventory.getHostVars('db1') ?? {};
      assert.strictEqual('template' in vars, false);
      assert.strictEqual('template_id' in vars, false);
      assert.deepStrictEqual(vars['user_attributes'], { role: 'db' });
    });

    it('should apply compose, groups and keyed_groups', async () => {
      // Arrange
      await writeFile(
        configPath,
        createConfig([
          'compose:',
          "  ansible_host: name ~ '.mgmt.example.test'",
          'groups:',
          "  powered_off: state == 'poweroff'",
          'keyed_groups:',
          '  - key: user_attributes.role',
          '    prefix: role',
          '    parent_group: roles',
        ]),
        'utf-8'
      );
      api.pool = [WEB1, DB1];

      // Act
      const run = await createSource().parse(configPath);

      // Assert
      const document = run.inventory.toAnsibleJson();
      assert.strictEqual(run.inventory.getHostVars('db1')?.['ansible_host'], 'db1.mgmt.example.test');
      assert.deepStrictEqual(document['powered_off'], { hosts: ['db1'] });
      assert.deepStrictEqual(document['role_db'], { hosts: ['db1'] });
      assert.deepStrictEqual(document['roles'], { children: ['role_db'] });
      assert.deepStrictEqual(document['ungrouped'], { hosts: ['web1.corp.local'] });
      assert.deepStrictEqual(document['all'], { children: ['ungrouped', 'powered_off', 'roles'] });
    });

    it('should use bare names with the name preference', async () => {
      // Arrange
      await writeFile(configPath, createConfig(['one_hostname_preference: name']), 'utf-8');

      // Act
      const run = await createSource().parse(configPath);

      // Assert
      assert.deepStrictEqual(run.hostnames, ['web1']);
      assert.strictEqual(api.count('one.vn.info'), 1);
    });
  });

  describe('fatal errors', () => {
    it('should abort on unknown state codes', async () => {
      await writeFile(configPath, createConfig(), 'utf-8');
      api.pool = [{ ...WEB1, LCM_STATE: '4242' }];

      await assert.rejects(() => createSource().parse(configPath), UnknownStateError);
    });

    it('should abort on remote failures', async () => {
      await writeFile(configPath, createConfig(), 'utf-8');
      api.failing.add('one.vn.info 2');

      await assert.rejects(() => createSource().parse(configPath), RemoteFailureError);
    });

    it('should abort on rule errors in strict mode', async () => {
      await writeFile(
        configPath,
        createConfig(['strict: true', 'compose:', '  owner: user_attributes.owner']),
        'utf-8'
      );

      await assert.rejects(() => createSource().parse(configPath), ConstructionError);
    });
  });

  describe('caching', () => {
    it('should not touch the cache when it is disabled', async () => {
      await writeFile(configPath, createConfig(), 'utf-8');

      await createSource().parse(configPath);

      await assert.rejects(() => access(join(tempDir, 'cache')));
    });

    it('should write on a miss and read on the next run', async () => {
      // Arrange
      await writeFile(configPath, createConfig(['cache: true']), 'utf-8');
      const source = createSource();

      // Act
      const first = await source.parse(configPath);
      const second = await source.parse(configPath);

      // Assert
      assert.strictEqual(first.fromCache, false);
      assert.strictEqual(second.fromCache, true);
      assert.strictEqual(first.cacheKey, getCacheKey(configPath));
      await access(join(tempDir, 'cache', `${first.cacheKey}.json`));
      assert.strictEqual(api.count('one.vmpool.infoextended'), 1);
      assert.deepStrictEqual(second.records, first.records);
      assert.deepStrictEqual(second.hostnames, ['web1.corp.local']);
    });

    it('should query and rewrite the cache on a forced refresh', async () => {
      // Arrange
      await writeFile(configPath, createConfig(['cache: true']), 'utf-8');
      await createSource().parse(configPath);
      api.pool = [WEB1, DB1];

      // Act
      const refreshed = await createSource().parse(configPath, { useCache: false });
      const cached = await createSource().parse(configPath);

      // Assert
      assert.strictEqual(refreshed.fromCache, false);
      assert.strictEqual(cached.fromCache, true);
      assert.deepStrictEqual(cached.hostnames, ['web1.corp.local', 'db1']);
      assert.strictEqual(api.count('one.vmpool.infoextended'), 2);
    });

    it('should share the memory store between runs of one source', async () => {
      // Arrange
      await writeFile(configPath, createConfig(['cache: true', 'cache_plugin: memory']), 'utf-8');
      const source = createSource();

      // Act
      await source.parse(configPath);
      const second = await source.parse(configPath);
      const other = await createSource().parse(configPath);

      // Assert
      assert.strictEqual(second.fromCache, true);
      assert.strictEqual(other.fromCache, false);
      await assert.rejects(() => access(join(tempDir, 'cache')));
    });

    it('should look up domains missing from cached records', async () => {
      // Arrange
      await writeFile(configPath, createConfig(['cache: true']), 'utf-8');
      api.networks = {};
      const first = await createSource().parse(configPath);
      api.networks = { 2: networkWithDomain('corp.local') };

      // Act
      const second = await createSource().parse(configPath);

      // Assert
      assert.deepStrictEqual(first.hostnames, ['web1']);
      assert.deepStrictEqual(second.hostnames, ['web1.corp.local']);
      assert.deepStrictEqual(second.records[0]?.network_id_domain_map, {});
    });

    it('should not serve one source the cache of a differently cased source', async () => {
      // Arrange
      const prodPath = join(tempDir, 'Prod.one.yaml');
      const labPath = join(tempDir, 'prod.one.yaml');
      await writeFile(prodPath, createConfig(['cache: true']), 'utf-8');
      await writeFile(labPath, createConfig(['cache: true']), 'utf-8');
      const labApi = new FakeOneApi([DB1]);

      // Act
      const prod = await createSource().parse(prodPath);
      const lab = await new InventorySource({ diagnostics, env: {}, createApi: () => labApi }).parse(
        labPath
      );

      // Assert
      assert.notStrictEqual(prod.cacheKey, lab.cacheKey);
      assert.strictEqual(lab.fromCache, false);
      assert.deepStrictEqual(lab.hostnames, ['db1']);
      assert.strictEqual(labApi.count('one.vmpool.infoextended'), 1);
    });
  });
});
