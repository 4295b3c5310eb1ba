/**
 * Suite wiring: builds the case list, provisions fixtures and runs everything once.
 */

import { existsSync } from 'fs';
import type { CaseDescriptor } from './cases.js';
import { loadCatalog } from './catalog.js';
import { Comparator } from './comparator.js';
import { ensureBuilt } from './build.js';
import { requireSubject, type HarnessConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { ConfigError } from './errors.js';
import { FifoSynchronizer } from './fifo.js';
import { withFixtures } from './fixtures.js';
import type { Logger } from './logger.js';
import { matrixCases } from './matrix.js';
import { ProcessRunner } from './process-runner.js';
import { CaseRegistry, isRunSuccessful, type RunSummary } from './registry.js';
import { buildJsonReport, ConsoleReporter, writeJsonReport, type Reporter } from './reporter.js';

export interface SuiteOptions {
  config: HarnessConfig;
  logger: Logger;
  filter?: string;
  reporter?: Reporter;
  /** Defaults to the bundled cases/catalog.json */
  catalogPath?: string;
  /** Leave out the generated matrix */
  skipMatrix?: boolean;
  /** Parent of the fixture directory, the OS temp dir by default */
  fixturesParent?: string;
}

export interface SuiteResult {
  summary: RunSummary;
  success: boolean;
}

/** Catalog cases first, then the generated matrix */
export function buildRegistry(catalogPath?: string, skipMatrix = false): CaseRegistry<CaseDescriptor> {
  const registry = new CaseRegistry<CaseDescriptor>();
  registry.registerAll(loadCatalog(catalogPath));
  if (!skipMatrix) registry.registerAll(matrixCases());
  return registry;
}

export async function runSuite(options: SuiteOptions): Promise<SuiteResult> {
  const { config, logger } = options;
  const subject = requireSubject(config);

  if (config.build) {
    await ensureBuilt(config.build, logger);
  }
  if (subject.includes('/') && !existsSync(subject)) {
    throw new ConfigError(`subject not found: ${subject}`);
  }

  const registry = buildRegistry(options.catalogPath, options.skipMatrix);
  const reporter = options.reporter ?? new ConsoleReporter({ verbose: logger.level === 'debug' });
  logger.info(`comparing ${subject} against ${config.reference} (${registry.size} cases registered)`);

  const summary = await withFixtures(async (fixtures) => {
    const runner = new ProcessRunner({ logger, timeoutMs: config.timeoutMs });
    const fifo = new FifoSynchronizer(runner, logger);
    const comparator = new Comparator(
      { subject, reference: config.reference, identity: config.identity },
      { runner, fifo, outputDir: fixtures.dir, logger }
    );
    const dispatcher = new Dispatcher({ fixtures, comparator, logger, streamDelayMs: config.streamDelayMs });

    return registry.execute((descriptor) => dispatcher.dispatch(descriptor), {
      filter: options.filter,
      reporter,
      logger,
    });
  }, options.fixturesParent);

  const success = isRunSuccessful(summary);
  if (config.reportPath) {
    await writeJsonReport(config.reportPath, buildJsonReport(summary, success));
    logger.info(`report written to ${config.reportPath}`);
  }
  return { summary, success };
}
