/**
 * Case descriptors: plain values interpreted by the dispatcher.
 *
 * Arguments and setup paths are templates. `{name}` expands to a fixture path
 * (see FixturePaths), `{dir}` to the fixture root, `{scratch}` to the case's own
 * directory and `{fifo}` to the case's named pipe.
 */

import { z } from 'zod';
import type { FixtureKey } from './fixtures.js';

export const FixtureKeySchema: z.ZodType<FixtureKey> = z.enum([
  'plain',
  'blank-lines',
  'tabs',
  'mixed-control',
  'control',
  'no-trailing-newline',
  'binary',
]);

export const StdinSourceSchema = z.union([
  /** Decoded as latin1, so U+0000..U+00FF map one-to-one onto bytes */
  z.object({ text: z.string() }).strict(),
  z.object({ fixture: FixtureKeySchema }).strict(),
  z.object({ buffer: z.enum(['stdinData', 'stdinMix']) }).strict(),
  z.object({ random: z.number().int().positive() }).strict(),
  /** Contents of a file, path given as a template */
  z.object({ path: z.string() }).strict(),
]);

export const SetupStepSchema = z.union([
  z.object({
    file: z.string(),
    text: z.string().optional(),
    repeat: z.object({ line: z.string(), count: z.number().int().nonnegative() }).strict().optional(),
    mode: z.number().int().min(0).max(0o777).optional(),
  }).strict(),
  z.object({ dir: z.string() }).strict(),
  z.object({ symlink: z.string(), target: z.string() }).strict(),
  z.object({ hardlink: z.string(), target: z.string() }).strict(),
]);

export const ScriptNameSchema = z.enum([
  'help-distinct',
  'version-distinct',
  'help-devnull-exit',
  'broken-pipe',
  'bundling-equivalence',
  'rerun-determinism',
  'empty-input-every-option',
  'preprocess-comment-lines',
]);

const nameSchema = z.string().min(1);

export const CompareCaseSchema = z.object({
  name: nameSchema,
  args: z.array(z.string()),
  stdin: StdinSourceSchema.optional(),
  setup: z.array(SetupStepSchema).optional(),
}).strict();

export const FifoCaseSchema = z.object({
  name: nameSchema,
  args: z.array(z.string()),
  chunks: z.array(StdinSourceSchema).min(1),
  /** Exact stdout the subject must produce, on top of matching the reference */
  expectStdout: z.string().optional(),
  setup: z.array(SetupStepSchema).optional(),
}).strict();

export const ScriptCaseSchema = z.object({
  name: nameSchema,
  script: ScriptNameSchema,
}).strict();

export const CatalogSchema = z.object({
  compare: z.array(CompareCaseSchema).default([]),
  fifo: z.array(FifoCaseSchema).default([]),
  script: z.array(ScriptCaseSchema).default([]),
}).strict();

export type StdinSource = z.infer<typeof StdinSourceSchema>;
export type SetupStep = z.infer<typeof SetupStepSchema>;
export type ScriptName = z.infer<typeof ScriptNameSchema>;
export type Catalog = z.infer<typeof CatalogSchema>;

export type CaseDescriptor =
  | ({ kind: 'compare' } & z.infer<typeof CompareCaseSchema>)
  | ({ kind: 'fifo' } & z.infer<typeof FifoCaseSchema>)
  | ({ kind: 'script' } & z.infer<typeof ScriptCaseSchema>);

export function catalogToDescriptors(catalog: Catalog): CaseDescriptor[] {
  return [
    ...catalog.compare.map((c): CaseDescriptor => ({ kind: 'compare', ...c })),
    ...catalog.fifo.map((c): CaseDescriptor => ({ kind: 'fifo', ...c })),
    ...catalog.script.map((c): CaseDescriptor => ({ kind: 'script', ...c })),
  ];
}
