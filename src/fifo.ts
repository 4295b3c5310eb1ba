/**
 * FIFO Synchronizer
 *
 * Feeds a named pipe from a background producer while a reader process consumes it.
 * Opening a FIFO for writing blocks until a reader opens it, so the producer is started
 * first and joined only after the reader has exited.
 */

import { execFile } from 'child_process';
import { open } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { promisify } from 'util';
import { FifoError } from './errors.js';
import type { Logger } from './logger.js';
import type { CmdOutput, CommandSpec, FileRunResult, ProcessRunner } from './process-runner.js';

const execFileAsync = promisify(execFile);

export interface FifoFeed {
  fifoPath: string;
  /** Written in order; delayMs apart when there is more than one */
  chunks: readonly Buffer[];
  delayMs: number;
}

export async function makeFifo(fifoPath: string, mode = 0o644): Promise<void> {
  try {
    await execFileAsync('mkfifo', ['-m', mode.toString(8), fifoPath]);
  } catch (error) {
    throw new FifoError(fifoPath, 'creating fifo', error);
  }
}

interface Producer {
  /** Already settled-wrapped so an early failure is never an unhandled rejection */
  done: Promise<PromiseSettledResult<void>>;
  /** Set once the write side is open, i.e. a reader has connected */
  opened: boolean;
  settled: boolean;
}

function startProducer(feed: FifoFeed): Producer {
  const state = { opened: false, settled: false };

  const write = async () => {
    const handle = await open(feed.fifoPath, 'w');
    state.opened = true;
    try {
      for (const [index, chunk] of feed.chunks.entries()) {
        if (index > 0 && feed.delayMs > 0) {
          await sleep(feed.delayMs);
        }
        await handle.write(chunk);
      }
    } finally {
      await handle.close();
    }
  };

  const done = Promise.allSettled([write()]).then(([result]) => {
    state.settled = true;
    return result;
  });

  return {
    done,
    get opened() {
      return state.opened;
    },
    get settled() {
      return state.settled;
    },
  };
}

export class FifoSynchronizer {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  run(executable: string, spec: CommandSpec, feed: FifoFeed): Promise<CmdOutput> {
    return this.withProducer(feed, () => this.runner.run(executable, spec));
  }

  runToFile(executable: string, spec: CommandSpec, feed: FifoFeed, outputPath: string): Promise<FileRunResult> {
    return this.withProducer(feed, () => this.runner.runToFile(executable, spec, outputPath));
  }

  private async withProducer<T>(feed: FifoFeed, read: () => Promise<T>): Promise<T> {
    const producer = startProducer(feed);
    const [reader] = await Promise.allSettled([read()]);

    // A reader that never opened the pipe would leave the producer blocked in open()
    if (!producer.opened && !producer.settled) {
      await this.drain(feed.fifoPath);
    }

    const written = await producer.done;
    if (reader.status === 'rejected') {
      throw reader.reason;
    }
    if (written.status === 'rejected') {
      throw new FifoError(feed.fifoPath, 'writing fifo', written.reason);
    }
    return reader.value;
  }

  private async drain(fifoPath: string): Promise<void> {
    const handle = await open(fifoPath, 'r');
    try {
      const leftover = await handle.readFile();
      this.logger.debug(`reader never opened ${fifoPath}; drained ${leftover.length}B`);
    } finally {
      await handle.close();
    }
  }
}
