import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { collectStatus } from '../../src/core/status/status-pipeline.js';
import { runHealthChecks, type HealthReport } from '../../src/core/status/health-checks.js';
import { dim, formatPackageLine, printHealthReport, printPackageList, sectionHeader } from '../../src/core/status/status-printers.js';
import {
  createFakeGit,
  createRecordingOutput,
  createTempDir,
  removeTempDir,
  testConfig
} from '../test-helpers.js';

const tree = [
  { source: 'a/x' },
  { source: 'b/y', dependencies: [{ source: 'c/z', dependencies: [{ source: 'd/deep' }] }, { source: 'e/w' }] },
  { alias: 'broken' }
];

describe('status', () => {
  let root: string;
  let installRoot: string;

  beforeEach(async () => {
    root = await createTempDir('status');
    installRoot = join(root, 'start');
    for (const name of ['x', 'y', 'deep', 'old']) {
      await mkdir(join(installRoot, name), { recursive: true });
    }
    await writeFile(join(installRoot, 'README.txt'), 'not a package');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('collectStatus', () => {
    it('mirrors the declared tree and cross-references the install root', async () => {
      const report = await collectStatus({ tree, config: testConfig(installRoot) });

      assert.equal(report.installRootExists, true);
      assert.equal(report.managedCount, 5);
      assert.deepEqual(report.packages.map(entry => [entry.name, entry.installed]), [['x', true], ['y', true]]);

      const [, y] = report.packages;
      assert.deepEqual(y.dependencies.map(entry => [entry.name, entry.depth, entry.installed]), [
        ['z', 1, false],
        ['w', 1, false]
      ]);
      assert.deepEqual(y.dependencies[0].dependencies.map(entry => entry.name), ['deep']);

      assert.deepEqual(report.missing, ['z', 'w']);
      assert.deepEqual(report.untracked, ['old']);
      assert.equal(report.invalid.length, 1);
    });

    it('hangs the dependencies of an invalid package off its nearest valid ancestor', async () => {
      const report = await collectStatus({
        tree: [
          { source: 'a/x' },
          { source: 'b/y', dependencies: [{ alias: 'broken', dependencies: [{ source: 'c/z' }] }] },
          { source: '', dependencies: [{ source: 'e/w' }] }
        ],
        config: testConfig(installRoot)
      });

      assert.deepEqual(report.packages.map(entry => [entry.name, entry.depth]), [['x', 0], ['y', 0], ['w', 0]]);
      assert.deepEqual(report.packages[1].dependencies.map(entry => [entry.name, entry.depth]), [['z', 1]]);
      assert.equal(report.managedCount, 4);
      assert.equal(report.invalid.length, 2);
    });

    it('reports a missing install root without failing', async () => {
      const report = await collectStatus({ tree: [{ source: 'a/x' }], config: testConfig(join(root, 'nowhere')) });

      assert.equal(report.installRootExists, false);
      assert.deepEqual(report.untracked, []);
      assert.deepEqual(report.missing, ['x']);
    });

    it('lists a shared name as missing once', async () => {
      const report = await collectStatus({
        tree: [{ source: 'a/lib' }, { source: 'b/y', dependencies: [{ source: 'other/lib' }] }],
        config: testConfig(installRoot)
      });

      assert.deepEqual(report.missing, ['lib']);
    });
  });

  describe('runHealthChecks', () => {
    async function check(missingGit = false): Promise<HealthReport> {
      return runHealthChecks(
        { tree, config: testConfig(installRoot) },
        { git: createFakeGit({ missing: missingGit }).run }
      );
    }

    it('groups findings into sections', async () => {
      const report = await check();

      assert.deepEqual(report.sections.map(section => section.title), [
        'External tools',
        'Config',
        'Managed packages (5)',
        'Untracked packages'
      ]);
      assert.deepEqual(report.sections[0].items, [{ level: 'ok', message: 'git is installed' }]);
      assert.deepEqual(report.sections[3].items, [{
        level: 'warn',
        message: 'Untracked packages found: old',
        advice: ['Run `tendril clean` to remove them']
      }]);
    });

    it('lists managed packages with their depth and a missing count', async () => {
      const { sections } = await check();
      const managed = sections[2].items;

      assert.deepEqual(managed.map(item => [item.level, item.message, item.depth]), [
        ['ok', 'x (a/x)', 0],
        ['ok', 'y (b/y)', 0],
        ['warn', 'z (c/z) is not installed', 1],
        ['ok', 'deep (d/deep)', 2],
        ['warn', 'w (e/w) is not installed', 1],
        [
          'error',
          `Invalid package {"alias":"broken"}: Validation error: missing source; expected e.g. { source: 'owner/repo' }`,
          0
        ],
        ['warn', '2 packages not installed', undefined]
      ]);
    });

    it('is unhealthy when an invalid node is declared', async () => {
      assert.equal((await check()).healthy, false);
    });

    it('is healthy when every check passes', async () => {
      const report = await runHealthChecks(
        { tree: [{ source: 'a/x' }], config: testConfig(installRoot) },
        { git: createFakeGit().run }
      );
      assert.equal(report.healthy, true);
    });

    it('flags a missing git executable with advice', async () => {
      const report = await check(true);

      assert.deepEqual(report.sections[0].items, [{
        level: 'error',
        message: 'git is not installed or not on your PATH',
        advice: ['Install it with your package manager', 'Check that your $PATH is set correctly']
      }]);
    });
  });

  describe('printers', () => {
    it('prints the package tree with connectors', async () => {
      const report = await collectStatus({ tree: tree.slice(0, 2), config: testConfig(installRoot) });
      const output = createRecordingOutput();

      printPackageList(report, output);

      const [, ...lines] = output.at('info');
      assert.deepEqual(lines, [
        `x ${dim('(a/x)')}`,
        `y ${dim('(b/y)')}`,
        `├── z ${dim('(c/z)')}${dim(' (missing)')}`,
        `│   └── deep ${dim('(d/deep)')}`,
        `└── w ${dim('(e/w)')}${dim(' (missing)')}`
      ]);
      assert.deepEqual(output.at('warn'), ['Untracked packages: old. Run `tendril clean` to remove them']);
    });

    it('formats a package line', () => {
      const line = formatPackageLine({
        name: 'x', source: 'a/x', installPath: '/p/x', depth: 0, installed: true, dependencies: []
      });
      assert.equal(line, `x ${dim('(a/x)')}`);
    });

    it('prints each health section under its header', () => {
      const output = createRecordingOutput();
      const report: HealthReport = {
        healthy: false,
        status: {
          installRoot: '/p',
          installRootExists: true,
          packages: [],
          managedCount: 0,
          invalid: [],
          untracked: [],
          missing: []
        },
        sections: [
          {
            title: 'External tools',
            items: [{ level: 'error', message: 'git is missing', advice: ['Install git'] }]
          },
          {
            title: 'Managed packages (1)',
            items: [{ level: 'warn', message: 'z (c/z) is not installed', depth: 1 }]
          }
        ]
      };

      printHealthReport(report, output);

      assert.deepEqual(output.messages, [
        { level: 'step', text: sectionHeader('External tools') },
        { level: 'error', text: 'git is missing' },
        { level: 'info', text: `  ${dim('-')} Install git` },
        { level: 'step', text: sectionHeader('Managed packages (1)') },
        { level: 'warn', text: '  z (c/z) is not installed' }
      ]);
    });
  });
});
