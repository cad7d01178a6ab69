import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { homedir } from 'os';
import { join } from 'path';

import { formatCount, formatPathForDisplay, getTreeConnector, getTreePrefix } from '../../src/utils/formatters.js';

describe('formatters', () => {
  describe('formatPathForDisplay', () => {
    it('prefers a path relative to the working directory', () => {
      assert.strictEqual(formatPathForDisplay('/work/project/pack/x', '/work/project'), 'pack/x');
    });

    it('uses tilde notation outside the working directory', () => {
      assert.strictEqual(formatPathForDisplay(join(homedir(), 'notes'), '/nonexistent-cwd'), '~/notes');
    });

    it('returns relative and tilde paths unchanged', () => {
      assert.strictEqual(formatPathForDisplay('~/x'), '~/x');
      assert.strictEqual(formatPathForDisplay('pack/x'), 'pack/x');
    });
  });

  it('draws tree connectors and prefixes', () => {
    assert.strictEqual(getTreeConnector(false), '├── ');
    assert.strictEqual(getTreeConnector(true), '└── ');
    assert.strictEqual(getTreePrefix('', false), '│   ');
    assert.strictEqual(getTreePrefix('│   ', true), '│       ');
  });

  it('formatCount pluralises', () => {
    assert.strictEqual(formatCount(1, 'package'), '1 package');
    assert.strictEqual(formatCount(0, 'package'), '0 packages');
    assert.strictEqual(formatCount(3, 'package'), '3 packages');
  });
});
