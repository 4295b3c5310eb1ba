/**
 * Per-case result lines on stdout, plus the optional JSON report.
 */

import writeFileAtomic from 'write-file-atomic';
import type { CaseOutcome, CaseStatus, RunSummary } from './registry.js';

export interface Reporter {
  caseStarted(name: string): void;
  caseFinished(outcome: CaseOutcome): void;
  runFinished(summary: RunSummary): void;
}

export interface ConsoleReporterOptions {
  /** Prints `[RUN ]` lines */
  verbose?: boolean;
  write?: (line: string) => void;
}

const TAGS: Record<CaseStatus, string> = {
  passed: '[PASS]',
  failed: '[FAIL]',
  error: '[ERR ]',
  timeout: '[TIME]',
};

export function formatOutcome(outcome: CaseOutcome): string {
  const tag = TAGS[outcome.status];
  return outcome.detail === undefined ? `${tag} ${outcome.name}` : `${tag} ${outcome.name}: ${outcome.detail}`;
}

export function formatSummary(summary: RunSummary): string {
  const filtered = summary.filter !== undefined ? ' (filtered)' : '';
  return `\n${summary.passed}/${summary.executed} tests executed${filtered}.`;
}

export class ConsoleReporter implements Reporter {
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.log(line));
  }

  caseStarted(name: string): void {
    if (this.verbose) this.write(`[RUN ] ${name}`);
  }

  caseFinished(outcome: CaseOutcome): void {
    this.write(formatOutcome(outcome));
  }

  runFinished(summary: RunSummary): void {
    this.write(formatSummary(summary));
  }
}

// ============================================================================
// JSON REPORT
// ============================================================================

export interface JsonReport {
  generatedAt: string;
  filter: string | null;
  totals: Record<CaseStatus, number> & { executed: number; registered: number };
  success: boolean;
  cases: CaseOutcome[];
}

export function buildJsonReport(summary: RunSummary, success: boolean, now: Date = new Date()): JsonReport {
  const totals = { passed: 0, failed: 0, error: 0, timeout: 0 };
  for (const outcome of summary.outcomes) totals[outcome.status]++;

  return {
    generatedAt: now.toISOString(),
    filter: summary.filter ?? null,
    totals: { ...totals, executed: summary.executed, registered: summary.registered },
    success,
    cases: summary.outcomes,
  };
}

export async function writeJsonReport(path: string, report: JsonReport): Promise<void> {
  await writeFileAtomic(path, `${JSON.stringify(report, null, 2)}\n`);
}
