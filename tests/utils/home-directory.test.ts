import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { homedir } from 'os';
import { join } from 'path';

import { expandTilde, getHomeDirectory, normalizePathWithTilde } from '../../src/utils/home-directory.js';
import { getDefaultInstallRoot, getTendrilDirectories } from '../../src/core/directory.js';

describe('Home Directory Utilities', () => {
  it('getHomeDirectory returns the OS home directory', () => {
    assert.strictEqual(getHomeDirectory(), homedir());
  });

  describe('normalizePathWithTilde', () => {
    it('shows the home directory itself as ~/', () => {
      assert.strictEqual(normalizePathWithTilde(homedir()), '~/');
    });

    it('shortens paths under home', () => {
      assert.strictEqual(normalizePathWithTilde(join(homedir(), '.config', 'tendril')), '~/.config/tendril');
    });

    it('leaves a sibling that merely shares the prefix alone', () => {
      const sibling = `${homedir()}-other`;
      assert.strictEqual(normalizePathWithTilde(sibling), sibling);
    });
  });

  describe('expandTilde', () => {
    it('expands ~ and ~/', () => {
      assert.strictEqual(expandTilde('~'), homedir());
      assert.strictEqual(expandTilde('~/'), homedir());
      assert.strictEqual(expandTilde('~/dev/plugin'), join(homedir(), 'dev', 'plugin'));
    });

    it('does not touch other users or plain paths', () => {
      assert.strictEqual(expandTilde('~someone/dev'), '~someone/dev');
      assert.strictEqual(expandTilde('./dev/plugin'), './dev/plugin');
      assert.strictEqual(expandTilde('/opt/~/x'), '/opt/~/x');
    });
  });
});

describe('tendril directories', () => {
  it('falls back to XDG defaults under home', () => {
    assert.deepStrictEqual(getTendrilDirectories({}), {
      config: join(homedir(), '.config', 'tendril'),
      data: join(homedir(), '.local', 'share')
    });
  });

  it('honours XDG variables and the tendril override', () => {
    assert.deepStrictEqual(getTendrilDirectories({ XDG_CONFIG_HOME: '/xdg/config', XDG_DATA_HOME: '/xdg/data' }), {
      config: '/xdg/config/tendril',
      data: '/xdg/data'
    });
    assert.strictEqual(getTendrilDirectories({ TENDRIL_CONFIG_DIR: '/custom', XDG_CONFIG_HOME: '/xdg' }).config, '/custom');
  });

  it('ignores blank variables', () => {
    assert.strictEqual(getTendrilDirectories({ XDG_DATA_HOME: '  ' }).data, join(homedir(), '.local', 'share'));
  });

  it('puts the default install root in the editor pack directory', () => {
    assert.strictEqual(getDefaultInstallRoot({ XDG_DATA_HOME: '/xdg/data' }), '/xdg/data/nvim/site/pack/tendril/start');
  });
});
