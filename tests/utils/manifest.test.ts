import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { loadManifest, parseManifest, resolveManifestPath } from '../../src/utils/manifest-yml.js';
import { ConfigError } from '../../src/utils/errors.js';
import { createTempDir, removeTempDir } from '../test-helpers.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

describe('manifest', () => {
  describe('parseManifest', () => {
    it('converts entries to a package tree and reads settings', () => {
      const manifest = parseManifest([
        'installRoot: plugins',
        'gitHost: https://git.example.test',
        'packages:',
        '  - source: a/x',
        '    branch: stable',
        '  - source: b/y',
        '    alias: why',
        '    dependencies:',
        '      - source: c/z',
        '      - just-a-string'
      ].join('\n'), '/home/test/dots/tendril.yml');

      assert.equal(manifest.directory, '/home/test/dots');
      assert.deepEqual(manifest.settings, {
        installRoot: '/home/test/dots/plugins',
        gitHost: 'https://git.example.test'
      });
      assert.deepEqual(manifest.packages, [
        { source: 'a/x', branch: 'stable' },
        { source: 'b/y', alias: 'why', dependencies: [{ source: 'c/z' }, 'just-a-string'] }
      ]);
    });

    it('turns hook commands into functions', () => {
      const manifest = parseManifest([
        'packages:',
        '  - source: a/x',
        '    postCheckout: make',
        '    configure: "  "',
        '    dependencies:',
        '      - source: c/z',
        '        configure: ./setup.sh'
      ].join('\n'), '/m/tendril.yml');

      const [root] = manifest.packages;
      assert.ok(isRecord(root));
      assert.equal(typeof root.postCheckoutHook, 'function');
      assert.equal('postCheckout' in root, false);
      assert.equal(root.configureHook, undefined);

      assert.ok(Array.isArray(root.dependencies));
      const [child] = root.dependencies;
      assert.ok(isRecord(child));
      assert.equal(typeof child.configureHook, 'function');
    });

    it('treats an empty document as an empty tree', () => {
      assert.deepEqual(parseManifest('', '/m/tendril.yml').packages, []);
      assert.deepEqual(parseManifest('gitHost: https://git.example.test\n', '/m/tendril.yml').packages, []);
    });

    it('rejects documents of the wrong shape', () => {
      assert.throws(() => parseManifest('- a/x\n', '/m/tendril.yml'), {
        message: '/m/tendril.yml: manifest must be a mapping with a packages list'
      });
      assert.throws(() => parseManifest('packages: a/x\n', '/m/tendril.yml'), {
        message: '/m/tendril.yml: packages must be a list'
      });
    });

    it('reports YAML syntax errors with the file path', () => {
      assert.throws(() => parseManifest('packages: [a/x\n', '/m/tendril.yml'), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.match(error.message, /^Failed to parse \/m\/tendril\.yml: /);
        return true;
      });
    });
  });

  describe('files', () => {
    let root: string;

    beforeEach(async () => {
      root = await createTempDir('manifest');
    });

    afterEach(async () => {
      await removeTempDir(root);
    });

    it('loads a manifest from disk', async () => {
      const path = join(root, 'tendril.yml');
      await writeFile(path, 'packages:\n  - source: a/x\n');

      const manifest = await loadManifest(path);

      assert.equal(manifest.path, path);
      assert.equal(manifest.directory, root);
      assert.deepEqual(manifest.packages, [{ source: 'a/x' }]);
    });

    it('fails on a missing manifest', async () => {
      await assert.rejects(loadManifest(join(root, 'nope.yml')), {
        name: 'ConfigError',
        message: `Manifest not found: ${join(root, 'nope.yml')}`
      });
    });

    it('prefers an explicit path, then the working directory, then the config directory', async () => {
      const configDir = join(root, 'config');
      const cwd = join(root, 'project');
      await mkdir(cwd, { recursive: true });
      const env = { TENDRIL_CONFIG_DIR: configDir };

      assert.equal(await resolveManifestPath({ manifest: 'other.yml', cwd, env }), join(cwd, 'other.yml'));
      assert.equal(await resolveManifestPath({ cwd, env }), join(configDir, 'tendril.yml'));

      await writeFile(join(cwd, 'tendril.yml'), 'packages: []\n');
      assert.equal(await resolveManifestPath({ cwd, env }), join(cwd, 'tendril.yml'));
    });
  });
});
