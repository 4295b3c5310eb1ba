import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { CONFIG_FILE_NAME, DEFAULTS, loadConfig, requireSubject, resolveCommand } from '../config.js';
import { ConfigError } from '../errors.js';
import { makeTempDir, removeDir } from './helpers.js';

let dir: string;

function writeConfig(content: unknown, name = CONFIG_FILE_NAME): string {
  const path = join(dir, name);
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

beforeEach(() => {
  dir = makeTempDir('config');
});

afterEach(() => {
  removeDir(dir);
});

// ============================================================================
// DEFAULTS AND FILE
// ============================================================================

describe('loadConfig defaults', () => {
  it('uses the built-in values without a file', () => {
    const config = loadConfig({ cwd: dir, env: {} });
    assert.strictEqual(config.subject, undefined);
    assert.strictEqual(config.reference, 'cat');
    assert.strictEqual(config.identity, 'cat');
    assert.strictEqual(config.timeoutMs, 0);
    assert.strictEqual(config.streamDelayMs, DEFAULTS.streamDelayMs);
    assert.strictEqual(config.logLevel, 'info');
    assert.strictEqual(config.reportPath, undefined);
    assert.strictEqual(config.build, undefined);
    assert.strictEqual(config.configPath, undefined);
    assert.deepStrictEqual(config.preprocess, { root: dir, outDir: 'processed', extension: '.asm', marker: ';' });
  });
});

describe('loadConfig file', () => {
  it('resolves paths against the config file directory', () => {
    const nested = join(dir, 'project');
    mkdirSync(nested);
    const path = join(nested, 'custom.json');
    writeFileSync(path, JSON.stringify({
      subject: './bin/mycat',
      timeoutMs: 500,
      streamDelayMs: 5,
      reportPath: 'out/report.json',
      build: { sources: ['src/cat.c'], outputs: ['bin/mycat'], steps: [['make']] },
      preprocess: { root: 'asm', extension: '.s' },
    }));

    const config = loadConfig({ cwd: dir, env: {}, configPath: 'project/custom.json' });
    assert.strictEqual(config.configPath, path);
    assert.strictEqual(config.subject, join(nested, 'bin', 'mycat'));
    assert.strictEqual(config.timeoutMs, 500);
    assert.strictEqual(config.streamDelayMs, 5);
    assert.strictEqual(config.reportPath, join(nested, 'out', 'report.json'));
    assert.deepStrictEqual(config.build, {
      sources: [join(nested, 'src', 'cat.c')],
      outputs: [join(nested, 'bin', 'mycat')],
      steps: [['make']],
      cwd: nested,
    });
    assert.deepStrictEqual(config.preprocess, {
      root: join(nested, 'asm'),
      outDir: 'processed',
      extension: '.s',
      marker: ';',
    });
  });

  it('picks up catdiff.config.json from cwd', () => {
    const path = writeConfig({ reference: '/usr/bin/cat' });
    const config = loadConfig({ cwd: dir, env: {} });
    assert.strictEqual(config.configPath, path);
    assert.strictEqual(config.reference, '/usr/bin/cat');
    assert.strictEqual(config.identity, '/usr/bin/cat');
  });

  it('keeps an explicit identity as written', () => {
    writeConfig({ reference: './ref/cat', identity: 'cat' });
    const config = loadConfig({ cwd: dir, env: {} });
    assert.strictEqual(config.reference, join(dir, 'ref', 'cat'));
    assert.strictEqual(config.identity, 'cat');
  });

  it('leaves bare command names for PATH lookup', () => {
    writeConfig({ subject: 'mycat' });
    assert.strictEqual(loadConfig({ cwd: dir, env: {} }).subject, 'mycat');
  });

  it('rejects a missing explicit file', () => {
    assert.throws(() => loadConfig({ cwd: dir, env: {}, configPath: 'nope.json' }), /config file not found/);
  });

  it('rejects malformed JSON', () => {
    writeConfig('{ not json');
    assert.throws(() => loadConfig({ cwd: dir, env: {} }), (error: unknown) =>
      error instanceof ConfigError && error.message.startsWith(`reading ${join(dir, CONFIG_FILE_NAME)}: `));
  });

  it('names invalid fields', () => {
    writeConfig({ timeoutMs: -1 });
    assert.throws(() => loadConfig({ cwd: dir, env: {} }), (error: unknown) =>
      error instanceof ConfigError && /timeoutMs: Number must be greater than or equal to 0/.test(error.message));
  });

  it('rejects unknown keys', () => {
    writeConfig({ subjct: './mycat' });
    assert.throws(() => loadConfig({ cwd: dir, env: {} }), ConfigError);
  });
});

// ============================================================================
// PRECEDENCE
// ============================================================================

describe('loadConfig precedence', () => {
  beforeEach(() => {
    writeConfig({ subject: './file-cat', timeoutMs: 500, logLevel: 'warn' });
  });

  it('lets the environment override the file', () => {
    const config = loadConfig({
      cwd: dir,
      env: { CATDIFF_SUBJECT: '/env/cat', CATDIFF_TIMEOUT_MS: '250', CATDIFF_LOG_LEVEL: 'debug' },
    });
    assert.strictEqual(config.subject, '/env/cat');
    assert.strictEqual(config.timeoutMs, 250);
    assert.strictEqual(config.logLevel, 'debug');
  });

  it('lets flags override the environment', () => {
    const config = loadConfig({
      cwd: dir,
      env: { CATDIFF_SUBJECT: '/env/cat', CATDIFF_TIMEOUT_MS: '250' },
      overrides: { subject: './flag-cat', timeoutMs: 100, logLevel: 'error', reportPath: 'r.json' },
    });
    assert.strictEqual(config.subject, join(dir, 'flag-cat'));
    assert.strictEqual(config.timeoutMs, 100);
    assert.strictEqual(config.logLevel, 'error');
    assert.strictEqual(config.reportPath, join(dir, 'r.json'));
  });

  it('ignores empty environment values', () => {
    const config = loadConfig({ cwd: dir, env: { CATDIFF_SUBJECT: '', CATDIFF_TIMEOUT_MS: '' } });
    assert.strictEqual(config.subject, join(dir, 'file-cat'));
    assert.strictEqual(config.timeoutMs, 500);
  });

  it('rejects a bad timeout in the environment', () => {
    assert.throws(
      () => loadConfig({ cwd: dir, env: { CATDIFF_TIMEOUT_MS: 'soon' } }),
      (error: unknown) => error instanceof ConfigError &&
        error.message === 'CATDIFF_TIMEOUT_MS must be a non-negative integer, got "soon"'
    );
  });

  it('rejects an unknown log level in the environment', () => {
    assert.throws(() => loadConfig({ cwd: dir, env: { CATDIFF_LOG_LEVEL: 'loud' } }), ConfigError);
  });
});

// ============================================================================
// HELPERS
// ============================================================================

describe('resolveCommand', () => {
  it('resolves only relative paths', () => {
    assert.strictEqual(resolveCommand('cat', '/base'), 'cat');
    assert.strictEqual(resolveCommand('./bin/cat', '/base'), '/base/bin/cat');
    assert.strictEqual(resolveCommand('bin/cat', '/base'), '/base/bin/cat');
    assert.strictEqual(resolveCommand('/usr/bin/cat', '/base'), '/usr/bin/cat');
  });
});

describe('requireSubject', () => {
  it('returns the configured subject', () => {
    const config = loadConfig({ cwd: dir, env: {}, overrides: { subject: '/opt/mycat' } });
    assert.strictEqual(requireSubject(config), '/opt/mycat');
  });

  it('raises ConfigError when none is set', () => {
    assert.throws(() => requireSubject(loadConfig({ cwd: dir, env: {} })), /no subject configured/);
  });
});
