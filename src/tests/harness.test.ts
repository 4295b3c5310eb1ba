import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { HarnessConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { buildRegistry, runSuite } from '../harness.js';
import { CAT_WRAPPER, makeTempDir, recordingLogger, RecordingReporter, removeDir, writeTool } from './helpers.js';

let dir: string;
let catalogPath: string;

const CATALOG = {
  compare: [
    { name: 'number lines', args: ['-n', '{blank}'] },
    { name: 'stdin squeeze', args: ['-s', '-'], stdin: { fixture: 'blank-lines' } },
    { name: 'missing file', args: ['{dir}/missing.txt'] },
  ],
  fifo: [
    { name: 'fifo chunks', args: ['{fifo}'], chunks: [{ text: 'one\n' }, { text: 'two\n' }], expectStdout: 'one\ntwo\n' },
  ],
};

function configFor(subject: string, extra: Partial<HarnessConfig> = {}): HarnessConfig {
  return {
    subject,
    reference: 'cat',
    identity: 'cat',
    timeoutMs: 0,
    streamDelayMs: 5,
    logLevel: 'info',
    preprocess: { root: dir, outDir: 'processed', extension: '.asm', marker: ';' },
    ...extra,
  };
}

beforeEach(() => {
  dir = makeTempDir('harness');
  catalogPath = join(dir, 'catalog.json');
  writeFileSync(catalogPath, JSON.stringify(CATALOG));
});

afterEach(() => {
  removeDir(dir);
});

describe('buildRegistry', () => {
  it('registers the bundled catalog and the matrix', () => {
    assert.strictEqual(buildRegistry().size, 294 + 2613);
  });

  it('can leave the matrix out', () => {
    assert.strictEqual(buildRegistry(undefined, true).size, 294);
    assert.strictEqual(buildRegistry(catalogPath, true).size, 4);
  });
});

describe('runSuite', () => {
  it('passes a subject that behaves like the reference', async () => {
    const reporter = new RecordingReporter();
    const { summary, success } = await runSuite({
      config: configFor(writeTool(dir, 'mycat', CAT_WRAPPER)),
      logger: recordingLogger('warn'),
      reporter,
      catalogPath,
      skipMatrix: true,
    });

    assert.strictEqual(success, true);
    assert.strictEqual(summary.passed, 4);
    assert.strictEqual(summary.executed, 4);
    assert.deepStrictEqual(reporter.events.filter((e) => !e.startsWith('start')), [
      'passed number lines',
      'passed stdin squeeze',
      'passed missing file',
      'passed fifo chunks',
      'done',
    ]);
  });

  it('fails the run when any case fails', async () => {
    const { summary, success } = await runSuite({
      config: configFor(writeTool(dir, 'nonumbers', 'case "$1" in -n) shift;; esac\nexec cat "$@"')),
      logger: recordingLogger('warn'),
      reporter: new RecordingReporter(),
      catalogPath,
      skipMatrix: true,
    });

    assert.strictEqual(success, false);
    assert.deepStrictEqual(summary.outcomes.map((o) => o.status), ['failed', 'passed', 'passed', 'passed']);
  });

  it('writes the JSON report', async () => {
    const reportPath = join(dir, 'report.json');
    await runSuite({
      config: configFor(writeTool(dir, 'mycat', CAT_WRAPPER), { reportPath }),
      logger: recordingLogger('warn'),
      reporter: new RecordingReporter(),
      catalogPath,
      skipMatrix: true,
      filter: 'fifo',
    });

    const report = JSON.parse(readFileSync(reportPath, 'utf-8'));
    assert.strictEqual(report.success, true);
    assert.strictEqual(report.filter, 'fifo');
    assert.deepStrictEqual(report.totals, { passed: 1, failed: 0, error: 0, timeout: 0, executed: 1, registered: 4 });
  });

  it('removes the fixtures when done', async () => {
    const parent = makeTempDir('harness-fixtures');
    try {
      await runSuite({
        config: configFor(writeTool(dir, 'mycat', CAT_WRAPPER)),
        logger: recordingLogger('warn'),
        reporter: new RecordingReporter(),
        catalogPath,
        skipMatrix: true,
        fixturesParent: parent,
      });
      assert.deepStrictEqual(readdirSync(parent), []);
    } finally {
      removeDir(parent);
    }
  });

  it('rejects a subject path that does not exist', async () => {
    await assert.rejects(
      runSuite({ config: configFor(join(dir, 'nope')), logger: recordingLogger('warn'), catalogPath, skipMatrix: true }),
      ConfigError
    );
  });

  it('marks a hung case as timed out', async () => {
    const { summary } = await runSuite({
      config: configFor(writeTool(dir, 'slow', 'exec sleep 5'), { timeoutMs: 200 }),
      logger: recordingLogger('warn'),
      reporter: new RecordingReporter(),
      catalogPath,
      skipMatrix: true,
      filter: 'number lines',
    });
    assert.strictEqual(summary.outcomes[0].status, 'timeout');
  });
});
