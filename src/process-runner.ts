/**
 * Process Runner
 *
 * Spawns one process with an exact argument vector, optional stdin payload and
 * optional argv[0] override, capturing stdout either through a pipe or into a file.
 *
 * Stdin is fed while output is being drained. Writing the whole payload before
 * reading would deadlock once both the stdin and stdout pipe buffers fill up.
 */

import { spawn, type ChildProcess, type StdioOptions } from 'child_process';
import { once } from 'events';
import { open } from 'fs/promises';
import type { Writable } from 'stream';
import { SpawnError, StdinWriteError, TimeoutError } from './errors.js';
import type { Logger } from './logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CommandSpec {
  /** Passed verbatim, never reordered */
  args: readonly string[];
  stdin?: Buffer;
  /** argv[0] seen by the child */
  identity?: string;
}

export interface CmdOutput {
  /** null when the process was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
}

export interface FileRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: Buffer;
}

export interface RunnerOptions {
  logger: Logger;
  /** 0 disables the timeout */
  timeoutMs?: number;
}

interface Exit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

// ============================================================================
// RUNNER
// ============================================================================

export class ProcessRunner {
  constructor(private readonly options: RunnerOptions) {}

  async run(executable: string, spec: CommandSpec): Promise<CmdOutput> {
    const result = await this.execute(executable, spec, 'pipe');
    this.options.logger.debug(
      `[CMD ] ${executable} ${JSON.stringify(spec.args)} -> status ${formatStatus(result)}, ` +
        `stdout ${result.stdout.length}B, stderr ${result.stderr.length}B`
    );
    return result;
  }

  /**
   * Same as run() but with stdout redirected to outputPath, which is created or truncated.
   */
  async runToFile(executable: string, spec: CommandSpec, outputPath: string): Promise<FileRunResult> {
    const handle = await open(outputPath, 'w');
    let result: CmdOutput;
    try {
      result = await this.execute(executable, spec, handle.fd);
    } finally {
      await handle.close();
    }
    this.options.logger.debug(
      `[CMD ] ${executable} ${JSON.stringify(spec.args)} -> status ${formatStatus(result)}, ` +
        `file stdout at ${outputPath}, stderr ${result.stderr.length}B`
    );
    return { exitCode: result.exitCode, signal: result.signal, stderr: result.stderr };
  }

  private async execute(executable: string, spec: CommandSpec, stdout: 'pipe' | number): Promise<CmdOutput> {
    const stdio: StdioOptions = [spec.stdin ? 'pipe' : 'ignore', stdout, 'pipe'];
    // Own process group under a timeout, so a kill reaches forked children too
    const child = spawn(executable, [...spec.args], {
      argv0: spec.identity,
      stdio,
      detached: (this.options.timeoutMs ?? 0) > 0,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    try {
      await once(child, 'spawn');
    } catch (error) {
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();
      throw new SpawnError(executable, spec.args, error);
    }

    // Writer starts before we block on the exit
    const feeding = spec.stdin && child.stdin
      ? feedStdin(child.stdin, spec.stdin)
      : Promise.resolve();

    const timer = this.armTimeout(child);
    const [exit, fed] = await Promise.allSettled([waitForClose(child), feeding]);
    if (timer.handle) clearTimeout(timer.handle);

    if (exit.status === 'rejected') {
      throw new SpawnError(executable, spec.args, exit.reason);
    }
    if (timer.fired) {
      throw new TimeoutError(executable, spec.args, this.options.timeoutMs ?? 0);
    }
    if (fed.status === 'rejected') {
      throw new StdinWriteError(executable, fed.reason);
    }

    return {
      exitCode: exit.value.code,
      signal: exit.value.signal,
      stdout: Buffer.concat(stdoutChunks),
      stderr: Buffer.concat(stderrChunks),
    };
  }

  private armTimeout(child: ChildProcess): { handle?: NodeJS.Timeout; fired: boolean } {
    const timer: { handle?: NodeJS.Timeout; fired: boolean } = { fired: false };
    const timeoutMs = this.options.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      timer.handle = setTimeout(() => {
        timer.fired = true;
        killGroup(child);
        // A descendant outside the group may still hold the pipes open
        child.stdin?.destroy();
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, timeoutMs);
    }
    return timer;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function killGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch {
    // Group already gone; the direct child may still be reaped
    child.kill('SIGKILL');
  }
}

function waitForClose(child: ChildProcess): Promise<Exit> {
  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
  });
}

/**
 * Writes the whole payload and closes the stream. Rejects on EPIPE and friends.
 */
export function feedStdin(stdin: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stdin.once('error', reject);
    stdin.once('finish', () => resolve());
    stdin.once('close', () => resolve());
    stdin.end(data);
  });
}

export function formatStatus(result: { exitCode: number | null; signal: NodeJS.Signals | null }): string {
  return result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : String(result.exitCode);
}
