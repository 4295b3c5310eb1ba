/**
 * Shared test plumbing: temp dirs, throwaway shell tools and recording sinks.
 */

import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLogger, type Logger, type LogLevel } from '../logger.js';
import type { Reporter } from '../reporter.js';
import type { CaseOutcome, RunSummary } from '../registry.js';

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `catdiff-test-${prefix}-`));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Writes an executable /bin/sh script and returns its path */
export function writeTool(dir: string, name: string, body: string): string {
  const path = join(dir, name);
  writeFileSync(path, `#!/bin/sh\n${body}\n`);
  chmodSync(path, 0o755);
  return path;
}

/** A subject indistinguishable from the system cat */
export const CAT_WRAPPER = 'exec cat "$@"';

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(level: LogLevel = 'debug'): RecordingLogger {
  const lines: string[] = [];
  const logger = createLogger(level, { write: (line) => lines.push(line), color: false });
  return Object.assign(logger, { lines });
}

export class RecordingReporter implements Reporter {
  readonly events: string[] = [];
  summary?: RunSummary;

  caseStarted(name: string): void {
    this.events.push(`start ${name}`);
  }

  caseFinished(outcome: CaseOutcome): void {
    this.events.push(`${outcome.status} ${outcome.name}`);
  }

  runFinished(summary: RunSummary): void {
    this.summary = summary;
    this.events.push('done');
  }
}
