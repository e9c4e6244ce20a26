/**
 * Unit tests for the XML-RPC HTTP transport
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { RemoteFailureError } from '../../../src/core/errors.js';
import { HttpTransport, type FetchLike, type FetchResponseLike } from '../../../src/opennebula/transport.js';
import { RecordingDiagnostics } from '../../helpers/fakes.js';

const ENDPOINT = 'http://one.example.test:2633/RPC2';

function reply(body: string, status = 200, statusText = 'OK'): FetchResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => body,
  };
}

const OK_BODY =
  '<?xml version="1.0"?><methodResponse><params><param><value><array><data>' +
  '<value><boolean>1</boolean></value><value><string>&lt;VM_POOL/&gt;</string></value>' +
  '<value><i4>0</i4></value></data></array></value></param></params></methodResponse>';

describe('HttpTransport', () => {
  it('should POST the encoded call and return the decoded value', async () => {
    const requests: Array<{ url: string; method: string; contentType: string | undefined; body: string }> = [];
    const fetch: FetchLike = async (url, init) => {
      requests.push({ url, method: init.method, contentType: init.headers['Content-Type'], body: init.body });
      return reply(OK_BODY);
    };
    const diagnostics = new RecordingDiagnostics();
    const transport = new HttpTransport({ url: ENDPOINT, fetch, diagnostics });

    const value = await transport.call('one.vmpool.infoextended', ['tester:test-secret', -2]);

    assert.deepStrictEqual(value, [true, '<VM_POOL/>', 0]);
    assert.strictEqual(requests.length, 1);
    assert.strictEqual(requests[0]?.url, ENDPOINT);
    assert.strictEqual(requests[0]?.method, 'POST');
    assert.strictEqual(requests[0]?.contentType, 'text/xml');
    assert.ok(requests[0]?.body.includes('<methodName>one.vmpool.infoextended</methodName>'));
    assert.deepStrictEqual(diagnostics.at('vvvv'), [`XML-RPC one.vmpool.infoextended -> ${ENDPOINT}`]);
  });

  it('should turn HTTP errors into RemoteFailureError', async () => {
    const transport = new HttpTransport({
      url: ENDPOINT,
      fetch: async () => reply('upstream down', 502, 'Bad Gateway'),
    });

    await assert.rejects(() => transport.call('one.vn.info', []), {
      name: 'RemoteFailureError',
      message: 'one.vn.info failed with HTTP 502 Bad Gateway',
    });
  });

  it('should turn network errors into RemoteFailureError', async () => {
    const transport = new HttpTransport({
      url: ENDPOINT,
      fetch: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    await assert.rejects(() => transport.call('one.vn.info', []), {
      name: 'RemoteFailureError',
      message: `one.vn.info could not reach ${ENDPOINT}: connect ECONNREFUSED`,
    });
  });

  it('should abort calls that exceed the timeout', async () => {
    const transport = new HttpTransport({
      url: ENDPOINT,
      timeout: 10,
      fetch: (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });

    await assert.rejects(() => transport.call('one.vn.info', []), {
      name: 'RemoteFailureError',
      message: 'one.vn.info timed out after 10ms',
    });
  });

  it('should report faults with their code', async () => {
    const fault =
      '<?xml version="1.0"?><methodResponse><fault><value><struct>' +
      '<member><name>faultCode</name><value><int>-32601</int></value></member>' +
      '<member><name>faultString</name><value><string>No such method</string></value></member>' +
      '</struct></value></fault></methodResponse>';
    const transport = new HttpTransport({ url: ENDPOINT, fetch: async () => reply(fault) });

    await assert.rejects(
      () => transport.call('one.nothing', []),
      (error: unknown) => {
        assert.ok(error instanceof RemoteFailureError);
        assert.strictEqual(error.message, 'one.nothing fault -32601: No such method');
        assert.strictEqual(error.remoteCode, -32601);
        return true;
      }
    );
  });

  it('should report malformed replies', async () => {
    const transport = new HttpTransport({ url: ENDPOINT, fetch: async () => reply('<html>oops</html>') });

    await assert.rejects(() => transport.call('one.vn.info', []), {
      name: 'RemoteFailureError',
      message: 'one.vn.info: Response is not an XML-RPC methodResponse',
    });
  });
});
