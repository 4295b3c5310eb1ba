import { resolve } from 'path';
import { loadConfig } from './config.js';
import { HarnessError, UsageError } from './errors.js';
import { buildRegistry, runSuite } from './harness.js';
import { createLogger, levelFromEnv, type Logger } from './logger.js';
import { preprocessTree } from './preprocess.js';
import { ConsoleReporter } from './reporter.js';

// ANSI colors
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const cyan = '\x1b[36m';

// ============================================================================
// ARGUMENTS
// ============================================================================

export interface TestsCommand {
  kind: 'tests';
  filter?: string;
  verbose: boolean;
  subject?: string;
  reference?: string;
  timeoutMs?: number;
  reportPath?: string;
  configPath?: string;
}

export interface ListCommand {
  kind: 'list';
  filter?: string;
  configPath?: string;
}

export interface PreprocessCommand {
  kind: 'preprocess';
  output?: string;
  root?: string;
  extension?: string;
  marker?: string;
  configPath?: string;
}

export type Command = TestsCommand | ListCommand | PreprocessCommand | { kind: 'help' };

type RunnableKind = Exclude<Command['kind'], 'help'>;

/**
 * Splits `--flag=value` and `--flag value`; returns the value and the index of the
 * last token consumed.
 */
function takeValue(args: readonly string[], index: number, flag: string): [string, number] {
  const token = args[index];
  const eq = token.indexOf('=');
  if (token.startsWith('--') && eq !== -1) {
    return [token.slice(eq + 1), index];
  }
  if (index + 1 >= args.length) {
    throw new UsageError(`${flag} needs a value`);
  }
  return [args[index + 1], index + 1];
}

function flagName(token: string): string {
  const eq = token.indexOf('=');
  return token.startsWith('--') && eq !== -1 ? token.slice(0, eq) : token;
}

function parseTimeout(raw: string): number {
  const value = Number(raw);
  if (raw === '' || !Number.isInteger(value) || value < 0) {
    throw new UsageError(`--timeout must be a non-negative integer (milliseconds), got ${JSON.stringify(raw)}`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): Command {
  if (argv.length === 0) {
    return { kind: 'tests', verbose: false };
  }

  const first = argv[0];
  let kind: RunnableKind;
  let rest: readonly string[];

  switch (first) {
    case 'help':
    case '--help':
    case '-h':
      return { kind: 'help' };
    case 'tests':
    case 'list':
    case 'preprocess':
      kind = first;
      rest = argv.slice(1);
      break;
    default:
      if (!first.startsWith('-')) {
        throw new UsageError(`unknown command: ${first}`);
      }
      kind = 'tests';
      rest = argv;
  }

  const tests: TestsCommand = { kind: 'tests', verbose: false };
  const preprocess: PreprocessCommand = { kind: 'preprocess' };

  for (let i = 0; i < rest.length; i++) {
    const flag = flagName(rest[i]);
    if (!FLAGS[kind].includes(flag)) {
      throw new UsageError(`unknown option for ${kind}: ${rest[i]}`);
    }

    if (flag === '-v' || flag === '--verbose') {
      tests.verbose = true;
      continue;
    }

    const [value, next] = takeValue(rest, i, flag);
    i = next;
    switch (flag) {
      case '-f':
      case '--filter':
        tests.filter = value;
        break;
      case '--subject':
        tests.subject = value;
        break;
      case '--reference':
        tests.reference = value;
        break;
      case '--timeout':
        tests.timeoutMs = parseTimeout(value);
        break;
      case '--report':
        tests.reportPath = value;
        break;
      case '--config':
        tests.configPath = value;
        preprocess.configPath = value;
        break;
      case '-o':
      case '--output':
        preprocess.output = value;
        break;
      case '--root':
        preprocess.root = value;
        break;
      case '--ext':
        preprocess.extension = value;
        break;
      case '--marker':
        preprocess.marker = value;
        break;
    }
  }

  if (kind === 'list') {
    return { kind: 'list', filter: tests.filter, configPath: tests.configPath };
  }
  return kind === 'preprocess' ? preprocess : tests;
}

const FLAGS: Record<RunnableKind, readonly string[]> = {
  tests: ['-f', '--filter', '-v', '--verbose', '--subject', '--reference', '--timeout', '--report', '--config'],
  list: ['-f', '--filter', '--config'],
  preprocess: ['-o', '--output', '--root', '--ext', '--marker', '--config'],
};

// ============================================================================
// COMMANDS
// ============================================================================

export function helpText(): string {
  return `
${bold}${cyan}catdiff${reset} - differential conformance tests for cat-compatible tools

${bold}Usage:${reset}
  catdiff [tests] [options]    Run every case against subject and reference
  catdiff list [options]       Print case names without running anything
  catdiff preprocess [options] Strip trailing comments from source files
  catdiff help                 Show this help

${bold}Test options:${reset}
  -f, --filter <text>     Only cases whose name contains <text>
  -v, --verbose           Log every command and [RUN ] lines
  --subject <path>        Executable under test
  --reference <cmd>       Trusted implementation ${dim}(default: cat)${reset}
  --timeout <ms>          Kill a process after <ms> ${dim}(default: 0, no limit)${reset}
  --report <file>         Write a JSON report
  --config <file>         Config file ${dim}(default: ./catdiff.config.json)${reset}

${bold}List options:${reset}
  -f, --filter <text>     Only cases whose name contains <text>
  --config <file>         Config file, checked but not otherwise used

${bold}Preprocess options:${reset}
  -o, --output <dir>      Output directory ${dim}(default: processed)${reset}
  --root <dir>            Directory to scan
  --ext <.asm>            Extension of files to process
  --marker <;>            Comment marker

${bold}Environment:${reset}
  CATDIFF_SUBJECT, CATDIFF_REFERENCE, CATDIFF_TIMEOUT_MS, CATDIFF_LOG_LEVEL
`;
}

export interface CliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** stdout sink for results, help and listings */
  write?: (line: string) => void;
  logger?: Logger;
}

async function runTests(command: TestsCommand, options: CliOptions, write: (line: string) => void): Promise<number> {
  const config = loadConfig({
    cwd: options.cwd,
    env: options.env,
    configPath: command.configPath,
    overrides: {
      subject: command.subject,
      reference: command.reference,
      timeoutMs: command.timeoutMs,
      reportPath: command.reportPath,
      logLevel: command.verbose ? 'debug' : undefined,
    },
  });
  const logger = options.logger ?? createLogger(config.logLevel);
  const reporter = new ConsoleReporter({ verbose: command.verbose || config.logLevel === 'debug', write });

  const { success } = await runSuite({ config, logger, filter: command.filter, reporter });
  if (!success) logger.error('failures encountered');
  return success ? 0 : 1;
}

function runList(command: ListCommand, options: CliOptions, write: (line: string) => void): number {
  // Nothing here needs the settings, but a broken config should fail the same way it does for tests
  loadConfig({ cwd: options.cwd ?? process.cwd(), env: options.env, configPath: command.configPath });
  const registry = buildRegistry();
  const selected = registry.select(command.filter);
  for (const descriptor of selected) {
    write(descriptor.name);
  }
  write(`\n${selected.length}/${registry.size} cases.`);
  return 0;
}

async function runPreprocess(command: PreprocessCommand, options: CliOptions, logger: Logger): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const config = loadConfig({ cwd, env: options.env, configPath: command.configPath });
  const root = command.root !== undefined ? resolve(cwd, command.root) : config.preprocess.root;
  const outDir = command.output !== undefined ? resolve(cwd, command.output) : config.preprocess.outDir;

  const processed = await preprocessTree({
    root,
    outDir,
    extension: command.extension ?? config.preprocess.extension,
    marker: command.marker ?? config.preprocess.marker,
    logger,
  });
  logger.info(`${processed.length} file(s) written under ${resolve(root, outDir)}`);
  return 0;
}

/**
 * Exit code 0 on success, 1 on failures or bad configuration. Errors that are not the
 * harness's own propagate.
 */
export async function runCLI(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const write = options.write ?? ((line: string) => console.log(line));
  const logger = options.logger ?? createLogger(levelFromEnv(options.env));

  try {
    const command = parseArgs(argv);
    switch (command.kind) {
      case 'help':
        write(helpText());
        return 0;
      case 'list':
        return runList(command, options, write);
      case 'preprocess':
        return await runPreprocess(command, options, logger);
      case 'tests':
        return await runTests(command, options, write);
    }
  } catch (error) {
    if (error instanceof HarnessError) {
      logger.error(error.message);
      if (error instanceof UsageError) write('Run: catdiff help');
      return 1;
    }
    throw error;
  }
}
