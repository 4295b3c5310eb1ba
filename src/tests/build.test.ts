import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, readFileSync, utimesSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ensureBuilt, needsRebuild } from '../build.js';
import type { BuildConfig } from '../config.js';
import { BuildError } from '../errors.js';
import { makeTempDir, recordingLogger, removeDir } from './helpers.js';

let dir: string;
let source: string;
let output: string;

function age(path: string, secondsAgo: number): void {
  const when = new Date(Date.now() - secondsAgo * 1000);
  utimesSync(path, when, when);
}

function buildConfig(steps: string[][]): BuildConfig {
  return { sources: [source], outputs: [output], steps, cwd: dir };
}

beforeEach(() => {
  dir = makeTempDir('build');
  source = join(dir, 'main.c');
  output = join(dir, 'mycat');
  writeFileSync(source, 'int main(void) { return 0; }\n');
  age(source, 1000);
});

afterEach(() => {
  removeDir(dir);
});

describe('needsRebuild', () => {
  it('is true when an output is missing', async () => {
    assert.strictEqual(await needsRebuild({ sources: [source], outputs: [output] }), true);
  });

  it('is false when outputs are newer than every source', async () => {
    writeFileSync(output, 'binary');
    assert.strictEqual(await needsRebuild({ sources: [source], outputs: [output] }), false);
  });

  it('is true when a source changed after the build', async () => {
    writeFileSync(output, 'binary');
    age(output, 2000);
    assert.strictEqual(await needsRebuild({ sources: [source], outputs: [output] }), true);
  });

  it('compares against the oldest output', async () => {
    const second = join(dir, 'helper');
    writeFileSync(output, 'binary');
    writeFileSync(second, 'binary');
    age(second, 2000);
    assert.strictEqual(await needsRebuild({ sources: [source], outputs: [output, second] }), true);
  });

  it('raises BuildError for a missing source', async () => {
    writeFileSync(output, 'binary');
    await assert.rejects(
      needsRebuild({ sources: [join(dir, 'gone.c')], outputs: [output] }),
      (error: unknown) => error instanceof BuildError && error.message === `build source not found: ${join(dir, 'gone.c')}`
    );
  });
});

describe('ensureBuilt', () => {
  it('runs the steps in the build directory when stale', async () => {
    const logger = recordingLogger('info');
    const ran = await ensureBuilt(buildConfig([['/bin/sh', '-c', 'printf built > mycat']]), logger);
    assert.strictEqual(ran, true);
    assert.strictEqual(readFileSync(output, 'utf-8'), 'built');
    assert.ok(logger.lines.some((line) => line.endsWith('[build] rebuilding subject')));
  });

  it('skips the steps when up to date', async () => {
    writeFileSync(output, 'binary');
    const marker = join(dir, 'ran');
    const ran = await ensureBuilt(buildConfig([['/bin/sh', '-c', 'touch ran']]), recordingLogger());
    assert.strictEqual(ran, false);
    assert.strictEqual(existsSync(marker), false);
  });

  it('stops at the first failing step', async () => {
    const marker = join(dir, 'ran');
    await assert.rejects(
      ensureBuilt(buildConfig([['false'], ['/bin/sh', '-c', 'touch ran']]), recordingLogger()),
      (error: unknown) => error instanceof BuildError && error.message.startsWith('build step failed: false: ')
    );
    assert.strictEqual(existsSync(marker), false);
  });
});
