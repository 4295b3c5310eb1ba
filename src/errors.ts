import type { ZodError } from 'zod';
import { renderMismatch, type MismatchReport } from './mismatch.js';

/**
 * Base class for everything the harness throws on purpose.
 * Anything else reaching the registry is treated as an infrastructure failure too.
 */
export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SpawnError extends HarnessError {
  constructor(
    readonly executable: string,
    readonly args: readonly string[],
    cause: unknown
  ) {
    super(`spawning ${executable} ${JSON.stringify(args)}: ${describeCause(cause)}`, { cause });
  }
}

export class StdinWriteError extends HarnessError {
  constructor(executable: string, cause: unknown) {
    super(`writing stdin of ${executable}: ${describeCause(cause)}`, { cause });
  }
}

export class FifoError extends HarnessError {
  constructor(fifoPath: string, action: string, cause: unknown) {
    super(`${action} ${fifoPath}: ${describeCause(cause)}`, { cause });
  }
}

export class TimeoutError extends HarnessError {
  constructor(
    readonly executable: string,
    readonly args: readonly string[],
    readonly timeoutMs: number
  ) {
    super(`${executable} ${JSON.stringify(args)} timed out after ${timeoutMs}ms`);
  }
}

export class MismatchError extends HarnessError {
  constructor(readonly report: MismatchReport) {
    super(renderMismatch(report));
  }
}

/** A scripted check that observed the wrong behaviour */
export class CheckFailure extends HarnessError {}

export class DuplicateCaseError extends HarnessError {
  constructor(readonly caseName: string) {
    super(`duplicate test case name: ${caseName}`);
  }
}

export class ConfigError extends HarnessError {}

/** Bad command line */
export class UsageError extends HarnessError {}

export class BuildError extends HarnessError {}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** One line per issue: `path.to.field: message` */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
