/**
 * Preprocess mode: copies source files with trailing same-line comments removed.
 * Lines that are nothing but a comment survive untouched.
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { dirname, extname, join, relative, resolve } from 'path';
import type { Logger } from './logger.js';

export interface PreprocessOptions {
  root: string;
  /** Relative paths resolve against root */
  outDir: string;
  /** Including the dot, e.g. `.asm` */
  extension: string;
  marker: string;
  logger?: Logger;
}

export interface ProcessedFile {
  source: string;
  output: string;
}

const SKIPPED_DIRS = new Set(['node_modules']);

export function stripComments(content: string, marker = ';'): string {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  let out = '';
  for (const raw of lines) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (line.trimStart().startsWith(marker)) {
      out += `${line}\n`;
      continue;
    }
    const cut = line.indexOf(marker);
    const code = cut === -1 ? line : line.slice(0, cut);
    out += `${code.replace(/[ \t\r\n]+$/, '')}\n`;
  }
  return out;
}

export async function processFile(source: string, output: string, marker = ';'): Promise<void> {
  const content = await readFile(source, 'utf-8');
  await mkdir(dirname(output), { recursive: true });
  await writeFile(output, stripComments(content, marker));
}

/**
 * Files under root with the extension, as sorted relative paths. Dot-directories,
 * node_modules and the excluded directories are not entered.
 */
export async function findSources(root: string, extension: string, exclude: readonly string[] = []): Promise<string[]> {
  const excluded = new Set(exclude.map((dir) => resolve(dir)));
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name) || excluded.has(resolve(path))) continue;
        await walk(path);
      } else if (entry.isFile() && extname(entry.name) === extension) {
        found.push(relative(root, path));
      }
    }
  }

  await walk(root);
  return found.sort();
}

export async function preprocessTree(options: PreprocessOptions): Promise<ProcessedFile[]> {
  const outDir = resolve(options.root, options.outDir);
  const sources = await findSources(options.root, options.extension, [outDir]);
  const processed: ProcessedFile[] = [];

  for (const rel of sources) {
    const source = join(options.root, rel);
    const output = join(outDir, rel);
    await processFile(source, output, options.marker);
    options.logger?.info(`Processed: ${rel} -> ${output}`);
    processed.push({ source, output });
  }
  return processed;
}
