/**
 * Fixture Provisioner
 *
 * Builds the throwaway directory every case reads from. Fixture files are read-only once
 * created; a case that needs its own files asks for a scratch directory instead.
 */

import { randomBytes } from 'crypto';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export type FixtureKey =
  | 'plain'
  | 'blank-lines'
  | 'tabs'
  | 'mixed-control'
  | 'control'
  | 'no-trailing-newline'
  | 'binary';

export const FIXTURE_KEYS: readonly FixtureKey[] = [
  'plain',
  'blank-lines',
  'tabs',
  'mixed-control',
  'control',
  'no-trailing-newline',
  'binary',
];

export interface FixturePaths {
  sampleA: string;
  sampleB: string;
  blank: string;
  tabs: string;
  mixed: string;
  dashName: string;
  optionLike: string;
  dashVFile: string;
  empty: string;
  noNewline: string;
  large: string;
  huge: string;
  control: string;
  binary: string;
  subdir: string;
}

export type FixtureName = keyof FixturePaths;

export interface Fixtures {
  dir: string;
  paths: FixturePaths;
  stdinData: Buffer;
  stdinMix: Buffer;
}

export type NamedBuffer = 'stdinData' | 'stdinMix';

const BINARY_FIXTURE_SIZE = 512;

function numberedLines(count: number): string {
  let out = '';
  for (let i = 1; i <= count; i++) {
    out += `line ${i}\n`;
  }
  return out;
}

export async function createFixtures(parent: string = tmpdir()): Promise<Fixtures> {
  const dir = await mkdtemp(join(parent, 'catdiff-'));
  const p = (name: string) => join(dir, name);

  const contents: Array<[string, string | Buffer]> = [
    ['a.txt', 'alpha\n'],
    ['b.txt', 'beta\n'],
    ['blank.txt', 'one\n\n\nthree\n\n\n'],
    ['tabs.txt', 'col1\tcol2\nline\t2\n'],
    ['mixed.txt', 'tab\t\x01\nline\t2\x7f\n'],
    ['-dash.txt', 'dash file\n'],
    ['-n', 'option-looking file\n'],
    ['-vfile.txt', 'dash-v data\n'],
    ['empty.txt', ''],
    ['no_newline.txt', 'no newline'],
    ['large.txt', numberedLines(3000)],
    ['huge.txt', numberedLines(1000)],
    ['control.txt', Buffer.from('plain\ncontrol:\x01here\nesc:\x1bX\nmeta:\x80Y\n', 'latin1')],
    ['binary.bin', randomBytes(BINARY_FIXTURE_SIZE)],
  ];

  for (const [name, data] of contents) {
    await writeFile(p(name), data);
  }
  await mkdir(p('adir'));

  return {
    dir,
    paths: {
      sampleA: p('a.txt'),
      sampleB: p('b.txt'),
      blank: p('blank.txt'),
      tabs: p('tabs.txt'),
      mixed: p('mixed.txt'),
      dashName: p('-dash.txt'),
      optionLike: p('-n'),
      dashVFile: p('-vfile.txt'),
      empty: p('empty.txt'),
      noNewline: p('no_newline.txt'),
      large: p('large.txt'),
      huge: p('huge.txt'),
      control: p('control.txt'),
      binary: p('binary.bin'),
      subdir: p('adir'),
    },
    stdinData: Buffer.from('stdin data\n'),
    stdinMix: Buffer.from('middle line\n'),
  };
}

export async function disposeFixtures(fixtures: Fixtures): Promise<void> {
  await rm(fixtures.dir, { recursive: true, force: true });
}

/**
 * Scoped provisioning: the directory is removed however fn settles.
 */
export async function withFixtures<T>(fn: (fixtures: Fixtures) => Promise<T>, parent?: string): Promise<T> {
  const fixtures = await createFixtures(parent);
  try {
    return await fn(fixtures);
  } finally {
    await disposeFixtures(fixtures);
  }
}

/** Fixture file holding the content each key stands for */
export const FIXTURE_FILES: Readonly<Record<FixtureKey, FixtureName>> = {
  'plain': 'sampleA',
  'blank-lines': 'blank',
  'tabs': 'tabs',
  'mixed-control': 'mixed',
  'control': 'control',
  'no-trailing-newline': 'noNewline',
  'binary': 'binary',
};

export function fixturePath(fixtures: Fixtures, key: FixtureKey): string {
  return fixtures.paths[FIXTURE_FILES[key]];
}

export function fixtureBytes(fixtures: Fixtures, key: FixtureKey): Promise<Buffer> {
  return readFile(fixturePath(fixtures, key));
}

/** A fresh, empty directory inside the fixture root */
export function scratchDir(fixtures: Fixtures, label = 'case'): Promise<string> {
  const safe = label.replace(/[^A-Za-z0-9]+/g, '-').slice(0, 40);
  return mkdtemp(join(fixtures.dir, `${safe}-`));
}
