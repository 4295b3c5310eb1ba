/**
 * Scripted checks against small shell stand-ins. The stand-ins wrap the system cat where
 * a check needs real option handling.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { join } from 'path';
import { Comparator } from '../comparator.js';
import { CheckFailure } from '../errors.js';
import { FifoSynchronizer } from '../fifo.js';
import { createFixtures, disposeFixtures, type Fixtures } from '../fixtures.js';
import { ProcessRunner } from '../process-runner.js';
import { pipelineStatus, SCRIPTS, type ScriptContext } from '../scripts.js';
import { CAT_WRAPPER, makeTempDir, recordingLogger, removeDir, writeTool } from './helpers.js';

// ============================================================================
// TEST SETUP
// ============================================================================

let tools: string;
let fixtures: Fixtures;
let toolCount = 0;
const logger = recordingLogger('info');

before(async () => {
  tools = makeTempDir('scripts');
  fixtures = await createFixtures();
});

after(async () => {
  await disposeFixtures(fixtures);
  removeDir(tools);
});

function tool(body: string): string {
  toolCount++;
  return writeTool(tools, `tool-${toolCount}`, body);
}

function contextFor(subjectBody: string, reference = 'cat'): ScriptContext {
  const runner = new ProcessRunner({ logger });
  const comparator = new Comparator(
    { subject: tool(subjectBody), reference },
    { runner, fifo: new FifoSynchronizer(runner, logger), outputDir: fixtures.dir, logger }
  );
  return { comparator, fixtures, logger };
}

const SWITCHES = `case "$1" in
  --help) echo "usage: subject [OPTION]... [FILE]..."; exit 0;;
  --version) echo "subject 1.0"; exit 0;;
esac
exec cat "$@"`;

// ============================================================================
// HELP AND VERSION
// ============================================================================

describe('help-distinct and version-distinct', () => {
  it('pass when the subject prints its own text', async () => {
    const context = contextFor(SWITCHES, tool('echo "reference help"'));
    await SCRIPTS['help-distinct'](context);
    await SCRIPTS['version-distinct'](context);
  });

  it('fail when the subject echoes the reference text', async () => {
    const reference = tool('echo "same text"');
    await assert.rejects(SCRIPTS['help-distinct'](contextFor('echo "same text"', reference)), /identical to the reference/);
  });

  it('fail when the subject prints nothing', async () => {
    await assert.rejects(SCRIPTS['version-distinct'](contextFor('exit 0', tool('echo ref'))), /--version printed nothing/);
  });

  it('fail when the subject exits non-zero', async () => {
    await assert.rejects(
      SCRIPTS['help-distinct'](contextFor('echo "bad option" >&2; exit 1', tool('echo ref'))),
      /--help exited with 1: bad option/
    );
  });
});

describe('help-devnull-exit', () => {
  it('passes when both sides exit alike', async () => {
    await SCRIPTS['help-devnull-exit'](contextFor('exit 0', tool('exit 0')));
  });

  it('fails on a different exit code', async () => {
    await assert.rejects(
      SCRIPTS['help-devnull-exit'](contextFor('exit 3', tool('exit 0'))),
      (error: unknown) => error instanceof CheckFailure && error.message === '--help exit mismatch 3 vs 0'
    );
  });
});

// ============================================================================
// BROKEN PIPE
// ============================================================================

describe('broken-pipe', () => {
  it('passes for a subject that behaves like the reference', async () => {
    await SCRIPTS['broken-pipe'](contextFor(CAT_WRAPPER));
  });

  it('fails for a subject that never writes', async () => {
    await assert.rejects(SCRIPTS['broken-pipe'](contextFor('cat > /dev/null; exit 0')), CheckFailure);
  });

  it('reports a clean exit for a tool that discards its input', async () => {
    const status = await pipelineStatus(tool('cat > /dev/null'), undefined, Buffer.from('data\n'), logger);
    assert.deepStrictEqual(status, { exitCode: 0, signal: null });
  });
});

// ============================================================================
// OPTION HANDLING
// ============================================================================

describe('bundling-equivalence', () => {
  it('passes when bundles and separate flags agree', async () => {
    await SCRIPTS['bundling-equivalence'](contextFor(CAT_WRAPPER));
  });

  it('fails a subject that treats bundles differently', async () => {
    const body = 'case "$1" in -??*) echo bundled;; esac\nexec cat "$@"';
    await assert.rejects(
      SCRIPTS['bundling-equivalence'](contextFor(body)),
      (error: unknown) => error instanceof CheckFailure && error.message.startsWith('bundling equivalence: 247 problem(s)\nsubject: -nb differs from -n -b')
    );
  });
});

describe('rerun-determinism', () => {
  it('passes for a stable subject', async () => {
    await SCRIPTS['rerun-determinism'](contextFor(CAT_WRAPPER));
  });

  it('fails when output changes between runs', async () => {
    const counter = join(tools, 'counter');
    const body = `n=$(cat "${counter}" 2>/dev/null || echo 0)\necho $((n + 1)) > "${counter}"\necho "$n"\nexec cat "$@"`;
    await assert.rejects(SCRIPTS['rerun-determinism'](contextFor(body)), /rerun determinism: 4 problem\(s\)/);
  });
});

describe('empty-input-every-option', () => {
  it('passes when nothing comes out of an empty input', async () => {
    await SCRIPTS['empty-input-every-option'](contextFor(CAT_WRAPPER));
  });

  it('fails a subject that prints on empty input', async () => {
    await assert.rejects(
      SCRIPTS['empty-input-every-option'](contextFor('echo x')),
      (error: unknown) => error instanceof CheckFailure &&
        error.message.startsWith('empty input: 651 problem(s)\nno options: status 0, stdout 2B')
    );
  });
});

// ============================================================================
// PREPROCESS
// ============================================================================

describe('preprocess-comment-lines', () => {
  it('passes with the bundled preprocessor', async () => {
    await SCRIPTS['preprocess-comment-lines'](contextFor(CAT_WRAPPER));
  });
});
