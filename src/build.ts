/**
 * Rebuilds the subject from source when it is missing or stale.
 */

import { execFile } from 'child_process';
import { stat } from 'fs/promises';
import { promisify } from 'util';
import type { BuildConfig } from './config.js';
import { BuildError, describeCause } from './errors.js';
import type { Logger } from './logger.js';

const execFileAsync = promisify(execFile);

async function mtimeOf(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Stale when an output is missing or any source is newer than the oldest output.
 */
export async function needsRebuild(build: Pick<BuildConfig, 'sources' | 'outputs'>): Promise<boolean> {
  let oldestOutput = Infinity;
  for (const output of build.outputs) {
    const mtime = await mtimeOf(output);
    if (mtime === undefined) return true;
    oldestOutput = Math.min(oldestOutput, mtime);
  }

  for (const source of build.sources) {
    const mtime = await mtimeOf(source);
    if (mtime === undefined) {
      throw new BuildError(`build source not found: ${source}`);
    }
    if (mtime > oldestOutput) return true;
  }
  return false;
}

/** Returns whether the steps ran */
export async function ensureBuilt(build: BuildConfig, logger: Logger): Promise<boolean> {
  if (!(await needsRebuild(build))) {
    logger.debug('[build] subject is up to date');
    return false;
  }

  logger.info('[build] rebuilding subject');
  for (const step of build.steps) {
    const [command, ...args] = step;
    try {
      const { stdout, stderr } = await execFileAsync(command, args, { cwd: build.cwd });
      if (stdout) logger.debug(`[build] ${command}: ${stdout.trim()}`);
      if (stderr) logger.debug(`[build] ${command} (stderr): ${stderr.trim()}`);
    } catch (error) {
      throw new BuildError(`build step failed: ${step.join(' ')}: ${describeCause(error)}`, { cause: error });
    }
  }
  return true;
}
