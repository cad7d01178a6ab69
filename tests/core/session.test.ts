import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { TendrilSession } from '../../src/core/session.js';
import type { PackageHookContext } from '../../src/types/index.js';
import {
  createCountingReindexer,
  createFakeGit,
  createRecordingOutput,
  createTempDir,
  removeTempDir,
  testConfig,
  type RecordingOutput
} from '../test-helpers.js';

describe('TendrilSession', () => {
  let root: string;
  let output: RecordingOutput;

  beforeEach(async () => {
    root = await createTempDir('session');
    output = createRecordingOutput();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function createSession(): TendrilSession {
    return new TendrilSession({
      config: testConfig(join(root, 'start')),
      baseDir: root,
      git: createFakeGit().run,
      reindexer: createCountingReindexer(),
      output
    });
  }

  describe('manage', () => {
    it('merges settings over the current configuration', async () => {
      const session = createSession();

      await session.manage([], { installRoot: 'plugins', gitHost: 'https://mirror.example.test' });

      assert.deepEqual(session.getConfig(), {
        installRoot: join(root, 'plugins'),
        gitHost: 'https://mirror.example.test',
        reindexCommand: []
      });
    });

    it('keeps settings a call does not name', async () => {
      const session = createSession();
      await session.manage([], { gitHost: 'https://mirror.example.test' });

      await session.manage([{ source: 'a/x' }]);

      assert.equal(session.getConfig().gitHost, 'https://mirror.example.test');
      assert.deepEqual(session.getTree(), [{ source: 'a/x' }]);
    });

    it('runs configure hooks once each, parents first', async () => {
      const seen: PackageHookContext[] = [];
      const hook = (ctx: PackageHookContext): void => {
        seen.push(ctx);
      };
      const session = createSession();

      const summary = await session.manage([
        { source: 'a/x', configureHook: hook },
        { source: 'b/y', configureHook: hook, dependencies: [{ source: 'c/z', alias: 'zed', configureHook: hook }] }
      ]);

      assert.equal(summary.configured, 3);
      assert.deepEqual(seen, [
        { name: 'x', source: 'a/x', installPath: join(root, 'start', 'x') },
        { name: 'y', source: 'b/y', installPath: join(root, 'start', 'y') },
        { name: 'zed', source: 'c/z', installPath: join(root, 'start', 'zed') }
      ]);
    });

    it('reports a failing configure hook and runs the rest', async () => {
      const ran: string[] = [];
      const session = createSession();

      const summary = await session.manage([
        {
          source: 'a/x',
          configureHook: () => {
            throw new Error('bad setup');
          }
        },
        { source: 'b/y', configureHook: ({ name }: PackageHookContext) => { ran.push(name); } }
      ]);

      assert.equal(summary.configured, 1);
      assert.equal(summary.failed.length, 1);
      assert.deepEqual(ran, ['y']);
      assert.deepEqual(output.at('error'), ["configure hook for 'x' failed: bad setup"]);
    });

    it('collects invalid nodes without reporting them', async () => {
      const session = createSession();

      const summary = await session.manage([{ source: 'a/x' }, 'bare-string']);

      assert.equal(summary.invalid.length, 1);
      assert.equal(summary.configured, 0);
      assert.deepEqual(output.messages, []);
    });
  });

  describe('operations', () => {
    it('installs the registered tree and reports its status', async () => {
      const session = createSession();
      await session.manage([{ source: 'a/x' }, { source: 'b/y' }]);

      const summary = await session.install();
      assert.equal(summary.counts.installed, 2);
      assert.deepEqual((await readdir(join(root, 'start'))).sort(), ['x', 'y']);

      const status = await session.status();
      assert.deepEqual(status.missing, []);
      assert.deepEqual(status.packages.map(entry => entry.installed), [true, true]);
    });

    it('cleans against the tree registered last', async () => {
      await mkdir(join(root, 'start', 'x'), { recursive: true });
      await mkdir(join(root, 'start', 'y'), { recursive: true });
      const session = createSession();
      await session.manage([{ source: 'a/x' }]);

      const summary = await session.clean({ yes: true });

      assert.deepEqual(summary.removed, ['y']);
    });

    it('checks git through the injected runner', async () => {
      const session = new TendrilSession({
        config: testConfig(join(root, 'start')),
        git: createFakeGit({ missing: true }).run,
        output
      });

      const report = await session.health();

      assert.equal(report.healthy, false);
      assert.equal(report.sections[0].items[0].message, 'git is not installed or not on your PATH');
    });
  });
});
