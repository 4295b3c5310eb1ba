/**
 * Scripted checks: behaviour that is not "subject output equals reference output".
 */

import { spawn, type ChildProcess } from 'child_process';
import { once } from 'events';
import { readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ScriptName } from './cases.js';
import type { Comparator, Side } from './comparator.js';
import { CheckFailure, SpawnError, describeCause } from './errors.js';
import { fixturePath, scratchDir, type Fixtures } from './fixtures.js';
import type { Logger } from './logger.js';
import { generateOptionSpecs, pickFixtureKey, SHORT_FLAGS, subsets } from './matrix.js';
import { lossy, sameOutput } from './mismatch.js';
import { processFile } from './preprocess.js';
import { feedStdin, formatStatus } from './process-runner.js';

export interface ScriptContext {
  comparator: Comparator;
  fixtures: Fixtures;
  logger: Logger;
}

export type ScriptCheck = (context: ScriptContext) => Promise<void>;

interface Status {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

const BROKEN_PIPE_PAYLOAD = Buffer.from('broken pipe data\n');

/** Failures listed in a CheckFailure before the rest are only counted */
const MAX_LISTED = 5;

// ============================================================================
// HELPERS
// ============================================================================

async function started(child: ChildProcess, executable: string, args: readonly string[]): Promise<void> {
  try {
    await once(child, 'spawn');
  } catch (error) {
    throw new SpawnError(executable, args, error);
  }
}

function closed(child: ChildProcess): Promise<Status> {
  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (exitCode: number | null, signal: NodeJS.Signals | null) => resolve({ exitCode, signal }));
  });
}

function sameStatus(a: Status, b: Status): boolean {
  return a.exitCode === b.exitCode && a.signal === b.signal;
}

function argv0For(comparator: Comparator, side: Side): string | undefined {
  return side === 'subject' ? comparator.subjectIdentity : undefined;
}

function failWith(check: string, problems: string[]): never {
  const listed = problems.slice(0, MAX_LISTED).join('\n');
  const more = problems.length > MAX_LISTED ? `\n... and ${problems.length - MAX_LISTED} more` : '';
  throw new CheckFailure(`${check}: ${problems.length} problem(s)\n${listed}${more}`);
}

// ============================================================================
// CHECKS
// ============================================================================

/**
 * The switch succeeds on the subject and prints something of its own rather than the
 * reference's text.
 */
function distinctOutput(flag: string): ScriptCheck {
  return async ({ comparator }) => {
    const subject = await comparator.capture('subject', { args: [flag] });
    const reference = await comparator.capture('reference', { args: [flag] });
    if (subject.exitCode !== 0) {
      throw new CheckFailure(`${flag} exited with ${formatStatus(subject)}: ${lossy(subject.stderr)}`);
    }
    if (subject.stdout.length === 0) {
      throw new CheckFailure(`${flag} printed nothing`);
    }
    if (subject.stdout.equals(reference.stdout)) {
      throw new CheckFailure(`${flag} output is identical to the reference's`);
    }
  };
}

async function helpToDevNull(comparator: Comparator, side: Side): Promise<Status> {
  const executable = comparator.executableFor(side);
  const args = ['--help'];
  const child = spawn(executable, args, { argv0: argv0For(comparator, side), stdio: 'ignore' });
  await started(child, executable, args);
  return closed(child);
}

const helpDevNullExit: ScriptCheck = async ({ comparator }) => {
  const subject = await helpToDevNull(comparator, 'subject');
  const reference = await helpToDevNull(comparator, 'reference');
  if (!sameStatus(subject, reference)) {
    throw new CheckFailure(`--help exit mismatch ${formatStatus(subject)} vs ${formatStatus(reference)}`);
  }
};

/**
 * `<tool> -` writing into `head -n0`, which exits without reading. Once head is gone the
 * payload goes in, and the tool's first write hits a closed pipe.
 */
export async function pipelineStatus(executable: string, argv0: string | undefined, data: Buffer, logger: Logger): Promise<Status> {
  const args = ['-'];
  const producer = spawn(executable, args, { argv0, stdio: ['pipe', 'pipe', 'ignore'] });
  await started(producer, executable, args);
  const producerExit = closed(producer);

  const consumer = spawn('head', ['-n0'], { stdio: [producer.stdout ?? 'ignore', 'ignore', 'ignore'] });
  await started(consumer, 'head', ['-n0']);
  const consumerExit = closed(consumer);
  // head holds the read end now; keeping ours open would stop the tool from ever seeing EPIPE
  producer.stdout?.destroy();
  await consumerExit;

  const [fed] = await Promise.allSettled([producer.stdin ? feedStdin(producer.stdin, data) : Promise.resolve()]);
  if (fed.status === 'rejected') {
    logger.debug(`stdin of ${executable} closed early: ${describeCause(fed.reason)}`);
  }
  return producerExit;
}

const brokenPipe: ScriptCheck = async ({ comparator, logger }) => {
  const subject = await pipelineStatus(comparator.targets.subject, comparator.subjectIdentity, BROKEN_PIPE_PAYLOAD, logger);
  const reference = await pipelineStatus(comparator.targets.reference, undefined, BROKEN_PIPE_PAYLOAD, logger);
  if (!sameStatus(subject, reference)) {
    throw new CheckFailure(`broken pipe exit mismatch ${formatStatus(subject)} vs ${formatStatus(reference)}`);
  }
};

/**
 * Bundled and separated spellings of every short-flag subset agree on each side. Checked
 * against the reference too, so a reference that applies bundles differently shows up
 * as such instead of as a subject bug.
 */
const bundlingEquivalence: ScriptCheck = async ({ comparator, fixtures, logger }) => {
  const problems: string[] = [];
  let checked = 0;

  for (const flags of subsets(SHORT_FLAGS)) {
    if (flags.length < 2) continue;
    const bundled = [`-${flags.join('')}`];
    const separated = flags.map((flag) => `-${flag}`);
    const file = fixturePath(fixtures, pickFixtureKey(bundled));

    for (const side of ['reference', 'subject'] as const) {
      const a = await comparator.capture(side, { args: [...bundled, file] });
      const b = await comparator.capture(side, { args: [...separated, file] });
      if (!sameOutput(a, b)) {
        problems.push(`${side}: ${bundled[0]} differs from ${separated.join(' ')}`);
      }
    }
    checked++;
  }

  logger.debug(`bundling checked for ${checked} flag sets`);
  if (problems.length > 0) failWith('bundling equivalence', problems);
};

const rerunDeterminism: ScriptCheck = async ({ comparator, fixtures }) => {
  const { paths } = fixtures;
  const inputs = [
    { args: ['-n', paths.blank] },
    { args: ['-A', paths.mixed] },
    { args: ['-s', '-b', paths.blank, paths.sampleB] },
    { args: ['-v', '-'], stdin: await readFile(paths.control) },
  ];

  const problems: string[] = [];
  for (const input of inputs) {
    const first = await comparator.capture('subject', input);
    const second = await comparator.capture('subject', input);
    if (!sameOutput(first, second)) {
      problems.push(`${JSON.stringify(input.args)} gave different output on the second run`);
    }
  }
  if (problems.length > 0) failWith('rerun determinism', problems);
};

const emptyInputEveryOption: ScriptCheck = async ({ comparator }) => {
  const problems: string[] = [];
  for (const spec of generateOptionSpecs()) {
    const out = await comparator.capture('subject', { args: [...spec.tokens, '-'], stdin: Buffer.alloc(0) });
    if (out.stdout.length > 0 || out.exitCode !== 0) {
      problems.push(`${spec.label}: status ${formatStatus(out)}, stdout ${out.stdout.length}B`);
    }
  }
  if (problems.length > 0) failWith('empty input', problems);
};

const preprocessCommentLines: ScriptCheck = async ({ fixtures }) => {
  const dir = await scratchDir(fixtures, 'preprocess');
  try {
    const source = join(dir, 'sample.asm');
    const output = join(dir, 'out', 'sample.asm');
    await writeFile(source, ';only comment\nmov rax, rbx ; trailing\n ; indented comment\nlabel: nop\n');
    await processFile(source, output, ';');

    const lines = (await readFile(output, 'utf-8')).split('\n');
    if (lines[0]?.trimStart() !== ';only comment') {
      throw new CheckFailure('comment-only line removed');
    }
    if (lines[1] !== 'mov rax, rbx') {
      throw new CheckFailure(`trailing comment not stripped: ${JSON.stringify(lines[1])}`);
    }
    if (lines[2]?.trimStart() !== '; indented comment') {
      throw new CheckFailure('indented comment line lost');
    }
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

export const SCRIPTS: Readonly<Record<ScriptName, ScriptCheck>> = {
  'help-distinct': distinctOutput('--help'),
  'version-distinct': distinctOutput('--version'),
  'help-devnull-exit': helpDevNullExit,
  'broken-pipe': brokenPipe,
  'bundling-equivalence': bundlingEquivalence,
  'rerun-determinism': rerunDeterminism,
  'empty-input-every-option': emptyInputEveryOption,
  'preprocess-comment-lines': preprocessCommentLines,
};
