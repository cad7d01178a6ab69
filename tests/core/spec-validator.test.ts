import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { describeNode, isPackageSpec, validatePackageSpec } from '../../src/core/spec-validator.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('validatePackageSpec', () => {
  it('accepts a record with a source', () => {
    const node = { source: 'owner/repo', branch: 'main' };
    const result = validatePackageSpec(node);
    assert.equal(result.valid, true);
    if (result.valid) {
      assert.equal(result.spec, node);
    }
  });

  it('rejects bare strings and primitives', () => {
    for (const node of ['owner/repo', 42, null, undefined, true]) {
      const result = validatePackageSpec(node);
      assert.equal(result.valid, false, `expected ${String(node)} to be rejected`);
    }
  });

  it('rejects a list', () => {
    const result = validatePackageSpec([{ source: 'owner/repo' }]);
    assert.equal(result.valid, false);
    if (!result.valid) {
      assert.match(result.error.message, /got a list$/);
    }
  });

  it('explains a missing source', () => {
    const result = validatePackageSpec({ alias: 'x' });
    assert.equal(result.valid, false);
    if (!result.valid) {
      assert.ok(result.error instanceof ValidationError);
      assert.equal(
        result.error.message,
        "Validation error: missing source; expected e.g. { source: 'owner/repo' }"
      );
    }
  });

  it('explains a non-string source', () => {
    const result = validatePackageSpec({ source: 7 });
    assert.equal(result.valid, false);
    if (!result.valid) {
      assert.equal(
        result.error.message,
        "Validation error: source must be a string, got number 7; expected e.g. { source: 'owner/repo' }"
      );
    }
  });

  it('rejects an empty or blank source', () => {
    for (const source of ['', '   ']) {
      const result = validatePackageSpec({ source });
      assert.equal(result.valid, false);
      if (!result.valid) {
        assert.equal(result.error.message, "Validation error: source is empty; expected e.g. { source: 'owner/repo' }");
      }
    }
  });

  it('rejects a node whose install name is unusable', () => {
    const bad = [{ source: 'owner/..' }, { source: 'owner/repo', alias: 'a/b' }, { source: 'owner/repo', alias: '' }];
    for (const node of bad) {
      assert.equal(validatePackageSpec(node).valid, false, JSON.stringify(node));
    }
  });

  it('does not inspect dependencies', () => {
    assert.equal(validatePackageSpec({ source: 'owner/repo', dependencies: ['not-a-spec'] }).valid, true);
  });
});

describe('isPackageSpec', () => {
  it('narrows records with a non-empty source', () => {
    assert.equal(isPackageSpec({ source: 'a/b' }), true);
    assert.equal(isPackageSpec({ source: '' }), false);
    assert.equal(isPackageSpec('a/b'), false);
  });
});

describe('describeNode', () => {
  it('renders each kind of value', () => {
    assert.equal(describeNode(null), 'null');
    assert.equal(describeNode('x'), "string 'x'");
    assert.equal(describeNode(3), 'number 3');
    assert.equal(describeNode([1]), 'a list');
    assert.equal(describeNode({ alias: 'x' }), '{"alias":"x"}');
  });
});
