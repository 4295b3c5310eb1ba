/**
 * Configuration
 *
 * Layers, lowest precedence first: defaults, catdiff.config.json, CATDIFF_* environment
 * variables, command-line flags. Resolved once at startup and passed down from there.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { ConfigError, describeCause, formatIssues } from './errors.js';
import { LogLevelSchema, type LogLevel } from './logger.js';

export const CONFIG_FILE_NAME = 'catdiff.config.json';

// ============================================================================
// SCHEMA
// ============================================================================

const nonNegativeInt = z.number().int().nonnegative();

export const BuildSchema = z.object({
  sources: z.array(z.string()).min(1),
  outputs: z.array(z.string()).min(1),
  /** Each step is an argv array, run without a shell */
  steps: z.array(z.array(z.string()).min(1)),
  cwd: z.string().optional(),
}).strict();

export const PreprocessSchema = z.object({
  root: z.string().optional(),
  outDir: z.string().optional(),
  extension: z.string().startsWith('.').optional(),
  marker: z.string().min(1).optional(),
}).strict();

export const ConfigFileSchema = z.object({
  subject: z.string().min(1).optional(),
  reference: z.string().min(1).optional(),
  identity: z.string().min(1).optional(),
  timeoutMs: nonNegativeInt.optional(),
  streamDelayMs: nonNegativeInt.optional(),
  logLevel: LogLevelSchema.optional(),
  reportPath: z.string().optional(),
  build: BuildSchema.optional(),
  preprocess: PreprocessSchema.optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface BuildConfig {
  sources: string[];
  outputs: string[];
  steps: string[][];
  cwd: string;
}

export interface PreprocessConfig {
  root: string;
  outDir: string;
  extension: string;
  marker: string;
}

export interface HarnessConfig {
  /** Unset until a layer names it; only test runs need it */
  subject?: string;
  reference: string;
  /** argv[0] for the subject */
  identity: string;
  /** 0 = no timeout */
  timeoutMs: number;
  streamDelayMs: number;
  logLevel: LogLevel;
  reportPath?: string;
  build?: BuildConfig;
  preprocess: PreprocessConfig;
  /** The file that was read, if any */
  configPath?: string;
}

export interface ConfigOverrides {
  subject?: string;
  reference?: string;
  timeoutMs?: number;
  logLevel?: LogLevel;
  reportPath?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit file; must exist. Otherwise catdiff.config.json in cwd, if present */
  configPath?: string;
  overrides?: ConfigOverrides;
}

export const DEFAULTS = {
  reference: 'cat',
  timeoutMs: 0,
  streamDelayMs: 50,
  logLevel: 'info',
  preprocess: { outDir: 'processed', extension: '.asm', marker: ';' },
} as const;

// ============================================================================
// LOADING
// ============================================================================

/**
 * Paths with a separator resolve against base; bare names are left for PATH lookup.
 */
export function resolveCommand(command: string, base: string): string {
  return command.includes('/') && !isAbsolute(command) ? resolve(base, command) : command;
}

export function readConfigFile(path: string): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`reading ${path}: ${describeCause(error)}`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`invalid config ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseEnvInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${JSON.stringify(raw)}`);
  }
  return value;
}

function parseEnvLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.CATDIFF_LOG_LEVEL;
  if (raw === undefined || raw === '') return undefined;
  const parsed = LogLevelSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`CATDIFF_LOG_LEVEL must be one of ${LogLevelSchema.options.join(', ')}, got ${JSON.stringify(raw)}`);
  }
  return parsed.data;
}

export function loadConfig(options: LoadConfigOptions = {}): HarnessConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let configPath: string | undefined;
  if (options.configPath !== undefined) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`config file not found: ${configPath}`);
    }
  } else if (existsSync(resolve(cwd, CONFIG_FILE_NAME))) {
    configPath = resolve(cwd, CONFIG_FILE_NAME);
  }

  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};
  const base = configPath ? dirname(configPath) : cwd;
  const fromFile = (command: string | undefined) => command === undefined ? undefined : resolveCommand(command, base);
  const fromCwd = (command: string | undefined) => command === undefined || command === '' ? undefined : resolveCommand(command, cwd);

  const subject = fromCwd(overrides.subject) ?? fromCwd(env.CATDIFF_SUBJECT) ?? fromFile(file.subject);
  const reference = fromCwd(overrides.reference) ?? fromCwd(env.CATDIFF_REFERENCE) ?? fromFile(file.reference) ?? DEFAULTS.reference;
  const reportPath = overrides.reportPath !== undefined
    ? resolve(cwd, overrides.reportPath)
    : file.reportPath !== undefined ? resolve(base, file.reportPath) : undefined;

  const build = file.build && {
    sources: file.build.sources.map((path) => resolve(base, path)),
    outputs: file.build.outputs.map((path) => resolve(base, path)),
    steps: file.build.steps,
    cwd: resolve(base, file.build.cwd ?? '.'),
  };

  return {
    subject,
    reference,
    identity: file.identity ?? reference,
    timeoutMs: overrides.timeoutMs ?? parseEnvInt(env, 'CATDIFF_TIMEOUT_MS') ?? file.timeoutMs ?? DEFAULTS.timeoutMs,
    streamDelayMs: file.streamDelayMs ?? DEFAULTS.streamDelayMs,
    logLevel: overrides.logLevel ?? parseEnvLevel(env) ?? file.logLevel ?? DEFAULTS.logLevel,
    reportPath,
    build,
    preprocess: {
      root: resolve(base, file.preprocess?.root ?? '.'),
      outDir: file.preprocess?.outDir ?? DEFAULTS.preprocess.outDir,
      extension: file.preprocess?.extension ?? DEFAULTS.preprocess.extension,
      marker: file.preprocess?.marker ?? DEFAULTS.preprocess.marker,
    },
    configPath,
  };
}

export function requireSubject(config: HarnessConfig): string {
  if (config.subject === undefined) {
    throw new ConfigError(`no subject configured: set "subject" in ${CONFIG_FILE_NAME}, CATDIFF_SUBJECT or --subject`);
  }
  return config.subject;
}
