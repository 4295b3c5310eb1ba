/**
 * Case Registry/Executor
 *
 * Ordered, uniquely named cases run one after another. Every selected case runs before
 * the verdict; a case's error never stops the run.
 */

import { CheckFailure, DuplicateCaseError, MismatchError, TimeoutError } from './errors.js';
import type { Logger } from './logger.js';
import type { Reporter } from './reporter.js';

// ============================================================================
// TYPES
// ============================================================================

export type CaseStatus = 'passed' | 'failed' | 'error' | 'timeout';

export interface CaseOutcome {
  name: string;
  status: CaseStatus;
  durationMs: number;
  /** Failure text, absent for passed cases */
  detail?: string;
}

export interface RunSummary {
  passed: number;
  executed: number;
  registered: number;
  filter?: string;
  outcomes: CaseOutcome[];
}

export interface NamedCase {
  name: string;
}

export type CaseHandler<T> = (entry: T) => Promise<void>;

// ============================================================================
// REGISTRY
// ============================================================================

/**
 * Mismatches and failed checks are test failures; anything else is the harness failing.
 */
export function classifyError(error: unknown): Exclude<CaseStatus, 'passed'> {
  if (error instanceof MismatchError || error instanceof CheckFailure) return 'failed';
  if (error instanceof TimeoutError) return 'timeout';
  return 'error';
}

export function isRunSuccessful(summary: RunSummary): boolean {
  return summary.filter !== undefined || summary.passed === summary.executed;
}

export class CaseRegistry<T extends NamedCase> {
  private readonly entries: T[] = [];
  private readonly names = new Set<string>();

  register(entry: T): void {
    if (this.names.has(entry.name)) {
      throw new DuplicateCaseError(entry.name);
    }
    this.names.add(entry.name);
    this.entries.push(entry);
  }

  registerAll(entries: Iterable<T>): void {
    for (const entry of entries) this.register(entry);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Registration order; substring match on the name when a filter is given */
  select(filter?: string): T[] {
    return filter === undefined
      ? [...this.entries]
      : this.entries.filter((entry) => entry.name.includes(filter));
  }

  async execute(
    handler: CaseHandler<T>,
    options: { filter?: string; reporter: Reporter; logger: Logger }
  ): Promise<RunSummary> {
    const { filter, reporter, logger } = options;
    const selected = this.select(filter);
    const outcomes: CaseOutcome[] = [];
    let passed = 0;

    logger.debug(`running ${selected.length} of ${this.entries.length} cases`);

    for (const entry of selected) {
      reporter.caseStarted(entry.name);
      const startedAt = Date.now();
      let outcome: CaseOutcome;
      try {
        await handler(entry);
        outcome = { name: entry.name, status: 'passed', durationMs: Date.now() - startedAt };
        passed++;
      } catch (error) {
        outcome = {
          name: entry.name,
          status: classifyError(error),
          durationMs: Date.now() - startedAt,
          detail: error instanceof Error ? error.message : String(error),
        };
      }
      outcomes.push(outcome);
      reporter.caseFinished(outcome);
    }

    const summary: RunSummary = {
      passed,
      executed: selected.length,
      registered: this.entries.length,
      filter,
      outcomes,
    };
    reporter.runFinished(summary);
    return summary;
  }
}
