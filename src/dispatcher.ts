/**
 * Case Dispatcher
 *
 * Interprets one CaseDescriptor: expands its templates against the fixture set, lays out
 * any files it asks for, feeds its input and hands the run to the comparator or to a
 * scripted check. Throws on any failure; the registry decides what the error means.
 */

import { randomBytes } from 'crypto';
import { chmod, link, mkdir, readFile, rm, symlink, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { CaseDescriptor, ScriptName, SetupStep, StdinSource } from './cases.js';
import type { Comparator } from './comparator.js';
import { CheckFailure, HarnessError, MismatchError } from './errors.js';
import { makeFifo } from './fifo.js';
import { fixtureBytes, scratchDir, type Fixtures } from './fixtures.js';
import type { Logger } from './logger.js';
import { lossy } from './mismatch.js';
import { SCRIPTS, type ScriptCheck } from './scripts.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DispatchContext {
  fixtures: Fixtures;
  comparator: Comparator;
  logger: Logger;
  /** Pause between FIFO chunks */
  streamDelayMs: number;
  scripts?: Readonly<Record<ScriptName, ScriptCheck>>;
}

/** Placeholder name -> value */
export type TemplateVars = ReadonlyMap<string, string>;

const PLACEHOLDER = /\{([A-Za-z]+)\}/g;
const FIFO_NAME = 'input.fifo';

// ============================================================================
// TEMPLATES
// ============================================================================

export function fixtureVars(fixtures: Fixtures, scratch?: string): Map<string, string> {
  const vars = new Map<string, string>(Object.entries(fixtures.paths));
  vars.set('dir', fixtures.dir);
  if (scratch !== undefined) {
    vars.set('scratch', scratch);
    vars.set('fifo', join(scratch, FIFO_NAME));
  }
  return vars;
}

/**
 * Replaces every `{name}`. An unknown name is a broken descriptor, not a test failure.
 */
export function resolveTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) => {
    const value = vars.get(name);
    if (value === undefined) {
      throw new HarnessError(`unknown placeholder ${match} in ${JSON.stringify(template)}`);
    }
    return value;
  });
}

function templatesOf(descriptor: CaseDescriptor): string[] {
  if (descriptor.kind === 'script') return [];

  const templates = [...descriptor.args];
  for (const step of descriptor.setup ?? []) {
    templates.push(...setupTemplates(step));
  }
  const sources = descriptor.kind === 'fifo'
    ? descriptor.chunks
    : descriptor.stdin ? [descriptor.stdin] : [];
  for (const source of sources) {
    if ('path' in source) templates.push(source.path);
  }
  return templates;
}

function setupTemplates(step: SetupStep): string[] {
  if ('file' in step) return [step.file];
  if ('dir' in step) return [step.dir];
  if ('symlink' in step) return [step.symlink, step.target];
  return [step.hardlink, step.target];
}

/** Whether the case needs a directory of its own */
export function needsScratch(descriptor: CaseDescriptor): boolean {
  if (descriptor.kind === 'fifo') return true;
  return templatesOf(descriptor).some((template) => template.includes('{scratch}') || template.includes('{fifo}'));
}

// ============================================================================
// INPUT AND SETUP
// ============================================================================

export async function materializeStdin(source: StdinSource, fixtures: Fixtures, vars: TemplateVars): Promise<Buffer> {
  if ('text' in source) return Buffer.from(source.text, 'latin1');
  if ('fixture' in source) return fixtureBytes(fixtures, source.fixture);
  if ('buffer' in source) return fixtures[source.buffer];
  if ('random' in source) return randomBytes(source.random);
  return readFile(resolveTemplate(source.path, vars));
}

export async function applySetup(steps: readonly SetupStep[], vars: TemplateVars): Promise<void> {
  for (const step of steps) {
    if ('file' in step) {
      const path = resolveTemplate(step.file, vars);
      const content = step.text !== undefined
        ? step.text
        : step.repeat ? step.repeat.line.repeat(step.repeat.count) : '';
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, Buffer.from(content, 'latin1'));
      // chmod rather than writeFile's mode, which the umask would narrow
      if (step.mode !== undefined) await chmod(path, step.mode);
    } else if ('dir' in step) {
      await mkdir(resolveTemplate(step.dir, vars), { recursive: true });
    } else if ('symlink' in step) {
      // target is stored as written, so relative links stay relative
      await symlink(resolveTemplate(step.target, vars), resolveTemplate(step.symlink, vars));
    } else {
      await link(resolveTemplate(step.target, vars), resolveTemplate(step.hardlink, vars));
    }
  }
}

// ============================================================================
// DISPATCH
// ============================================================================

export class Dispatcher {
  private readonly scripts: Readonly<Record<ScriptName, ScriptCheck>>;

  constructor(private readonly context: DispatchContext) {
    this.scripts = context.scripts ?? SCRIPTS;
  }

  async dispatch(descriptor: CaseDescriptor): Promise<void> {
    if (descriptor.kind === 'script') {
      const { comparator, fixtures, logger } = this.context;
      await this.scripts[descriptor.script]({ comparator, fixtures, logger });
      return;
    }

    const scratch = needsScratch(descriptor)
      ? await scratchDir(this.context.fixtures, descriptor.name)
      : undefined;
    try {
      const vars = fixtureVars(this.context.fixtures, scratch);
      await applySetup(descriptor.setup ?? [], vars);
      if (descriptor.kind === 'compare') {
        await this.runCompare(descriptor, vars);
      } else {
        await this.runFifo(descriptor, vars);
      }
    } finally {
      if (scratch !== undefined) {
        await rm(scratch, { recursive: true, force: true });
      }
    }
  }

  private async runCompare(
    descriptor: Extract<CaseDescriptor, { kind: 'compare' }>,
    vars: TemplateVars
  ): Promise<void> {
    const args = descriptor.args.map((arg) => resolveTemplate(arg, vars));
    const stdin = descriptor.stdin
      ? await materializeStdin(descriptor.stdin, this.context.fixtures, vars)
      : undefined;

    const report = await this.context.comparator.compare(descriptor.name, { args, stdin });
    if (report) throw new MismatchError(report);
  }

  private async runFifo(
    descriptor: Extract<CaseDescriptor, { kind: 'fifo' }>,
    vars: TemplateVars
  ): Promise<void> {
    const fifoPath = vars.get('fifo');
    if (fifoPath === undefined) {
      throw new HarnessError(`${descriptor.name}: no scratch directory for the fifo`);
    }
    await makeFifo(fifoPath);

    const args = descriptor.args.map((arg) => resolveTemplate(arg, vars));
    const chunks: Buffer[] = [];
    for (const source of descriptor.chunks) {
      chunks.push(await materializeStdin(source, this.context.fixtures, vars));
    }
    const feed = { fifoPath, chunks, delayMs: this.context.streamDelayMs };

    if (descriptor.expectStdout !== undefined) {
      const expected = Buffer.from(descriptor.expectStdout, 'latin1');
      const out = await this.context.comparator.capture('subject', { args, feed });
      if (!out.stdout.equals(expected)) {
        throw new CheckFailure(
          `${descriptor.name}: expected ${JSON.stringify(lossy(expected))}, got ${JSON.stringify(lossy(out.stdout))}`
        );
      }
    }

    const report = await this.context.comparator.compareFifo(descriptor.name, args, feed);
    if (report) throw new MismatchError(report);
  }
}
