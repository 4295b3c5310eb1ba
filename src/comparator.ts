/**
 * Comparator
 *
 * Runs subject and reference with identical arguments and input, first through pipes
 * (stdout, stderr and exit status must match) and then with stdout redirected to a file
 * (the written bytes must match). The subject sees the reference's name as argv[0], so
 * diagnostics that embed the program name line up.
 */

import { randomUUID } from 'crypto';
import { readFile, rm } from 'fs/promises';
import { join } from 'path';
import type { FifoFeed, FifoSynchronizer } from './fifo.js';
import type { Logger } from './logger.js';
import { sameOutput, type MismatchReport } from './mismatch.js';
import type { CmdOutput, CommandSpec, ProcessRunner } from './process-runner.js';

export interface Targets {
  subject: string;
  /** Command name or path of the trusted implementation */
  reference: string;
  /** argv[0] for the subject, the reference command when unset */
  identity?: string;
}

export interface ComparatorOptions {
  runner: ProcessRunner;
  fifo: FifoSynchronizer;
  /** Where redirected output files are created; must already exist */
  outputDir: string;
  logger: Logger;
}

export interface CompareInput {
  args: readonly string[];
  stdin?: Buffer;
  /** When set, a producer feeds this FIFO during every run */
  feed?: FifoFeed;
}

export type Side = 'subject' | 'reference';

export class Comparator {
  constructor(
    readonly targets: Targets,
    private readonly options: ComparatorOptions
  ) {}

  get subjectIdentity(): string {
    return this.targets.identity ?? this.targets.reference;
  }

  /**
   * Returns null when both capture modes agree, otherwise the first divergence found.
   */
  async compare(label: string, input: CompareInput): Promise<MismatchReport | null> {
    const subject = await this.capture('subject', input);
    const reference = await this.capture('reference', input);
    if (!sameOutput(subject, reference)) {
      return { mode: 'pipe', label, args: input.args, subject, reference };
    }

    const subjectBytes = await this.captureToFile('subject', input);
    const referenceBytes = await this.captureToFile('reference', input);
    if (!subjectBytes.equals(referenceBytes)) {
      return { mode: 'file', label, args: input.args, subjectBytes, referenceBytes };
    }

    this.options.logger.debug(`${label}: ${subject.stdout.length}B identical in both modes`);
    return null;
  }

  /** compare() with every run reading a FIFO that a producer fills with the feed's chunks */
  compareFifo(label: string, args: readonly string[], feed: FifoFeed): Promise<MismatchReport | null> {
    return this.compare(label, { args, feed });
  }

  /** Pipe-mode run of one side, for checks that inspect a single output */
  capture(side: Side, input: CompareInput): Promise<CmdOutput> {
    const executable = this.executableFor(side);
    const spec = this.specFor(side, input);
    return input.feed
      ? this.options.fifo.run(executable, spec, input.feed)
      : this.options.runner.run(executable, spec);
  }

  async captureToFile(side: Side, input: CompareInput): Promise<Buffer> {
    const outputPath = join(this.options.outputDir, `out-${side}-${randomUUID()}`);
    const executable = this.executableFor(side);
    const spec = this.specFor(side, input);
    try {
      if (input.feed) {
        await this.options.fifo.runToFile(executable, spec, input.feed, outputPath);
      } else {
        await this.options.runner.runToFile(executable, spec, outputPath);
      }
      return await readFile(outputPath);
    } finally {
      await rm(outputPath, { force: true });
    }
  }

  executableFor(side: Side): string {
    return side === 'subject' ? this.targets.subject : this.targets.reference;
  }

  private specFor(side: Side, input: CompareInput): CommandSpec {
    return {
      args: input.args,
      stdin: input.stdin,
      identity: side === 'subject' ? this.subjectIdentity : undefined,
    };
  }
}
