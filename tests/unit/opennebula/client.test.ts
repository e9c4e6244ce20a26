/**
 * Unit tests for the OpenNebula client
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { NotFoundError, RemoteFailureError } from '../../../src/core/errors.js';
import { OneClient, parseOneDocument, toElementList } from '../../../src/opennebula/client.js';
import type { RpcTransport } from '../../../src/opennebula/transport.js';
import type { XmlRpcValue } from '../../../src/opennebula/xmlrpc.js';
import { ONE_ERROR_CODES } from '../../../src/opennebula/types.js';

/**
 * Transport answering every call with a fixed reply and recording the calls
 */
class StubTransport implements RpcTransport {
  readonly calls: Array<{ method: string; params: readonly XmlRpcValue[] }> = [];

  constructor(private readonly replies: Record<string, XmlRpcValue>) {}

  async call(method: string, params: readonly XmlRpcValue[]): Promise<XmlRpcValue> {
    this.calls.push({ method, params });
    const reply = this.replies[method];
    if (reply === undefined) {
      throw new RemoteFailureError(`${method} not stubbed`, method);
    }
    return reply;
  }
}

const POOL_XML =
  '<VM_POOL>' +
  '<VM><ID>5</ID><NAME>web1</NAME><STATE>3</STATE><LCM_STATE>3</LCM_STATE>' +
  '<TEMPLATE><NIC><NETWORK_ID>2</NETWORK_ID><IP>10.0.0.5</IP></NIC><TEMPLATE_ID>12</TEMPLATE_ID></TEMPLATE>' +
  '<USER_TEMPLATE><ROLE><![CDATA[web]]></ROLE></USER_TEMPLATE></VM>' +
  '<VM><ID>6</ID><NAME>db1</NAME><STATE>8</STATE><LCM_STATE>0</LCM_STATE><DEPLOY_ID></DEPLOY_ID></VM>' +
  '</VM_POOL>';

describe('OneClient', () => {
  it('should build the session string', () => {
    assert.strictEqual(OneClient.session('tester', 'test-secret'), 'tester:test-secret');
  });

  it('should list the VM pool with every VM', async () => {
    const transport = new StubTransport({ 'one.vmpool.infoextended': [true, POOL_XML, 0] });
    const client = new OneClient(transport, 'tester:test-secret');

    const pool = await client.vmPoolInfoExtended();

    assert.deepStrictEqual(transport.calls, [
      { method: 'one.vmpool.infoextended', params: ['tester:test-secret', -2, -1, -1, -1] },
    ]);
    assert.deepStrictEqual(pool, [
      {
        ID: '5',
        NAME: 'web1',
        STATE: '3',
        LCM_STATE: '3',
        TEMPLATE: { NIC: { NETWORK_ID: '2', IP: '10.0.0.5' }, TEMPLATE_ID: '12' },
        USER_TEMPLATE: { ROLE: 'web' },
      },
      { ID: '6', NAME: 'db1', STATE: '8', LCM_STATE: '0', DEPLOY_ID: '' },
    ]);
  });

  it('should return an empty list for an empty pool', async () => {
    const client = new OneClient(
      new StubTransport({ 'one.vmpool.infoextended': [true, '<VM_POOL></VM_POOL>', 0] }),
      'tester:test-secret'
    );

    assert.deepStrictEqual(await client.vmPoolInfoExtended(), []);
  });

  it('should return the template and network elements', async () => {
    const transport = new StubTransport({
      'one.template.info': [true, '<VMTEMPLATE><ID>12</ID><NAME>ubuntu</NAME></VMTEMPLATE>', 0],
      'one.vn.info': [true, '<VNET><ID>2</ID><TEMPLATE><DOMAIN>corp.local.</DOMAIN></TEMPLATE></VNET>', 0],
    });
    const client = new OneClient(transport, 'tester:test-secret');

    assert.deepStrictEqual(await client.templateInfo(12), { ID: '12', NAME: 'ubuntu' });
    assert.deepStrictEqual(await client.vnInfo(2), { ID: '2', TEMPLATE: { DOMAIN: 'corp.local.' } });
    assert.deepStrictEqual(transport.calls[1]?.params, ['tester:test-secret', 2]);
  });

  it('should raise NotFoundError when oned reports a missing object', async () => {
    const client = new OneClient(
      new StubTransport({
        'one.vn.info': [false, '[one.vn.info] Error getting virtual network [9].', ONE_ERROR_CODES.NO_EXISTS],
      }),
      'tester:test-secret'
    );

    await assert.rejects(
      () => client.vnInfo(9),
      (error: unknown) => {
        assert.ok(error instanceof NotFoundError);
        assert.strictEqual(error.message, '[one.vn.info] Error getting virtual network [9].');
        assert.strictEqual(error.objectId, 9);
        return true;
      }
    );
  });

  it('should raise RemoteFailureError for other failures', async () => {
    const client = new OneClient(
      new StubTransport({
        'one.vmpool.infoextended': [false, '[one.vmpool.infoextended] User couldn\'t be authenticated', 0x100],
        'one.template.info': ['unexpected'],
      }),
      'tester:bad'
    );

    await assert.rejects(
      () => client.vmPoolInfoExtended(),
      (error: unknown) => {
        assert.ok(error instanceof RemoteFailureError);
        assert.strictEqual(error.remoteCode, ONE_ERROR_CODES.AUTHENTICATION);
        return true;
      }
    );
    await assert.rejects(() => client.templateInfo(1), {
      name: 'RemoteFailureError',
      message: 'one.template.info returned an unexpected reply',
    });
  });
});

describe('parseOneDocument', () => {
  it('should reject documents without the expected root', () => {
    assert.throws(() => parseOneDocument('<VNET><ID>1</ID></VNET>', 'VMTEMPLATE', 'one.template.info'), {
      name: 'RemoteFailureError',
      message: 'one.template.info returned no VMTEMPLATE element',
    });
  });
});

describe('toElementList', () => {
  it('should wrap single elements and drop leaves', () => {
    assert.deepStrictEqual(toElementList({ ID: '1' }), [{ ID: '1' }]);
    assert.deepStrictEqual(toElementList([{ ID: '1' }, 'x', { ID: '2' }]), [{ ID: '1' }, { ID: '2' }]);
    assert.deepStrictEqual(toElementList(''), []);
    assert.deepStrictEqual(toElementList(undefined), []);
  });
});
