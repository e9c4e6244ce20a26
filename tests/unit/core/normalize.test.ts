/**
 * Unit tests for the remote object normalizer
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { normalize } from '../../../src/core/normalize.js';

describe('normalize', () => {
  it('should lower-case keys and keep non-empty strings', () => {
    const result = normalize({ NETWORK_ID: '2', IP: '10.0.0.5', MAC: '' });

    assert.deepStrictEqual(result, { network_id: '2', ip: '10.0.0.5' });
  });

  it('should flatten nested elements into the same map', () => {
    const result = normalize({
      ROLE: 'web',
      SCHED: { DS_REQUIREMENTS: 'ID=100', INNER: { OWNER: 'ops' } },
    });

    assert.deepStrictEqual(result, {
      role: 'web',
      ds_requirements: 'ID=100',
      owner: 'ops',
    });
  });

  it('should let a later key overwrite an earlier one', () => {
    const result = normalize({ NAME: 'outer', CHILD: { NAME: 'inner' } });

    assert.deepStrictEqual(result, { name: 'inner' });
  });

  it('should skip text nodes and lists', () => {
    const result = normalize({ '#text': 'stray', TAGS: ['a', 'b'], ENV: 'prod' });

    assert.deepStrictEqual(result, { env: 'prod' });
  });

  it('should leave its own flat output unchanged', () => {
    const once = normalize({
      ROLE: 'web',
      SCHED: { DS_REQUIREMENTS: 'ID=100', INNER: { OWNER: 'ops' } },
      EMPTY: '',
    });

    assert.deepStrictEqual(normalize(once), once);
  });

  it('should return an empty map for an empty element', () => {
    assert.deepStrictEqual(normalize({}), {});
  });
});
