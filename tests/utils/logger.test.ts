import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { resolveLogLevel } from '../../src/utils/logger.js';
import { LogLevel } from '../../src/types/index.js';

describe('resolveLogLevel', () => {
  it('defaults to errors only', () => {
    assert.equal(resolveLogLevel({}), LogLevel.ERROR);
  });

  it('reads a named level in any case', () => {
    assert.equal(resolveLogLevel({ TENDRIL_LOG_LEVEL: ' Warn ' }), LogLevel.WARN);
  });

  it('treats TENDRIL_VERBOSE=1 as debug', () => {
    assert.equal(resolveLogLevel({ TENDRIL_VERBOSE: '1' }), LogLevel.DEBUG);
  });

  it('prefers a valid named level over the verbose flag', () => {
    assert.equal(resolveLogLevel({ TENDRIL_LOG_LEVEL: 'info', TENDRIL_VERBOSE: '1' }), LogLevel.INFO);
    assert.equal(resolveLogLevel({ TENDRIL_LOG_LEVEL: 'loud', TENDRIL_VERBOSE: '1' }), LogLevel.DEBUG);
  });
});
