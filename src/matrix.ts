/**
 * Matrix Generator
 *
 * Produces the deduplicated set of option vectors the suite runs against every input
 * shape, and picks for each vector the fixture that actually exercises its flags.
 */

import type { CaseDescriptor } from './cases.js';
import { FIXTURE_FILES, type FixtureKey } from './fixtures.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OptionSpec {
  label: string;
  /** Order is significant: `-n -b` and `-b -n` are different specs */
  tokens: readonly string[];
}

// ============================================================================
// ALPHABETS
// ============================================================================

export const SHORT_FLAGS = ['n', 'b', 's', 'E', 'T', 'v', 'u', 'A'] as const;

export const LONG_FLAGS = [
  '--number',
  '--number-nonblank',
  '--squeeze-blank',
  '--show-ends',
  '--show-tabs',
  '--show-nonprinting',
  '--show-all',
] as const;

/** Spellings that bundling over SHORT_FLAGS never produces */
export const EXTRA_SHORT_SEQUENCES: readonly (readonly string[])[] = [
  ['-e'],
  ['-t'],
  ['-e', '-s'],
  ['-t', '-s'],
  ['-e', '-n'],
  ['-t', '-n'],
  ['-e', '-b'],
  ['-t', '-b'],
  ['-e', '-u'],
  ['-t', '-u'],
  ['-e', '-s', '-n'],
  ['-t', '-s', '-n'],
  ['-e', '-s', '-b'],
  ['-t', '-s', '-b'],
];

/** Overriding flags, each pair listed in both orders */
export const ORDER_SENSITIVE_PAIRS: readonly (readonly string[])[] = [
  ['-n', '-b'],
  ['-b', '-n'],
  ['-s', '-n'],
  ['-n', '-s'],
  ['-s', '-b'],
  ['-b', '-s'],
  ['-E', '-T'],
  ['-T', '-E'],
  ['--number', '--number-nonblank'],
  ['--number-nonblank', '--number'],
  ['--squeeze-blank', '--number'],
  ['--number', '--squeeze-blank'],
  ['--show-ends', '--show-tabs'],
  ['--show-tabs', '--show-ends'],
];

export const BINARY_OPTION_SETS: readonly (readonly string[])[] = [
  [],
  ['-v'],
  ['-A'],
  ['-t'],
  ['-e'],
  ['--show-nonprinting'],
  ['--show-all'],
  ['--show-ends'],
  ['--show-tabs'],
];

// ============================================================================
// DEDUPLICATION
// ============================================================================

interface TrieNode {
  children: Map<string, TrieNode>;
  terminal: boolean;
}

/**
 * Set of token sequences keyed on the sequence itself, one trie level per token.
 */
export class TokenSequenceSet {
  private readonly root: TrieNode = { children: new Map(), terminal: false };
  private count = 0;

  get size(): number {
    return this.count;
  }

  /** Returns false when the sequence was already present */
  add(tokens: readonly string[]): boolean {
    let node = this.root;
    for (const token of tokens) {
      let next = node.children.get(token);
      if (!next) {
        next = { children: new Map(), terminal: false };
        node.children.set(token, next);
      }
      node = next;
    }
    if (node.terminal) return false;
    node.terminal = true;
    this.count++;
    return true;
  }

  has(tokens: readonly string[]): boolean {
    let node: TrieNode | undefined = this.root;
    for (const token of tokens) {
      node = node.children.get(token);
      if (!node) return false;
    }
    return node.terminal;
  }
}

// ============================================================================
// GENERATION
// ============================================================================

/**
 * Every non-empty subset in mask order; members keep their alphabet order.
 */
export function subsets<T>(alphabet: readonly T[]): T[][] {
  const result: T[][] = [];
  for (let mask = 1; mask < 1 << alphabet.length; mask++) {
    result.push(alphabet.filter((_, idx) => ((mask >> idx) & 1) === 1));
  }
  return result;
}

export function generateOptionSpecs(): OptionSpec[] {
  const specs: OptionSpec[] = [];
  const seen = new TokenSequenceSet();
  const push = (label: string, tokens: readonly string[]) => {
    if (seen.add(tokens)) specs.push({ label, tokens: [...tokens] });
  };

  push('no options', []);

  for (const flags of subsets(SHORT_FLAGS)) {
    const bundle = `-${flags.join('')}`;
    push(`short bundled ${bundle}`, [bundle]);
    if (flags.length > 1) {
      const separate = flags.map((flag) => `-${flag}`);
      push(`short separate ${separate.join(' ')}`, separate);
    }
  }

  for (const tokens of EXTRA_SHORT_SEQUENCES) {
    push(`short extra ${tokens.join(' ')}`, tokens);
  }

  for (const tokens of subsets(LONG_FLAGS)) {
    push(`long ${tokens.join(' ')}`, tokens);
  }

  for (const tokens of ORDER_SENSITIVE_PAIRS) {
    push(`order ${tokens.join(' ')}`, tokens);
  }

  return specs;
}

// ============================================================================
// FIXTURE HEURISTIC
// ============================================================================

/** True when any single-dash token carries the flag letter, bundled or not */
export function optionHasShort(tokens: readonly string[], flag: string): boolean {
  return tokens.some((token) => token.startsWith('-') && !token.startsWith('--') && token.slice(1).includes(flag));
}

export function optionHasLong(tokens: readonly string[], flag: string): boolean {
  return tokens.includes(flag);
}

export function pickFixtureKey(tokens: readonly string[]): FixtureKey {
  const short = (...flags: string[]) => flags.some((flag) => optionHasShort(tokens, flag));
  const long = (...flags: string[]) => flags.some((flag) => optionHasLong(tokens, flag));

  if (long('--show-all') || short('A', 't')) return 'mixed-control';
  if (short('T') || long('--show-tabs')) return 'tabs';
  if (short('e', 'v') || long('--show-nonprinting')) return 'control';
  if (short('s', 'b', 'n') || long('--squeeze-blank', '--number-nonblank', '--number')) return 'blank-lines';
  if (short('E') || long('--show-ends')) return 'no-trailing-newline';
  return 'plain';
}

// ============================================================================
// CASES
// ============================================================================

function placeholder(key: FixtureKey): string {
  return `{${FIXTURE_FILES[key]}}`;
}

/**
 * Four shapes per option spec: one file, the file plus a second one, the same bytes on
 * stdin, and stdin followed by a second file.
 */
export function casesForSpec(spec: OptionSpec): CaseDescriptor[] {
  const key = pickFixtureKey(spec.tokens);
  const file = placeholder(key);
  const second = '{sampleB}';
  const tokens = [...spec.tokens];

  return [
    { kind: 'compare', name: `matrix file ${spec.label}`, args: [...tokens, file] },
    { kind: 'compare', name: `matrix multi ${spec.label}`, args: [...tokens, file, second] },
    { kind: 'compare', name: `matrix stdin ${spec.label}`, args: [...tokens, '-'], stdin: { fixture: key } },
    {
      kind: 'compare',
      name: `matrix stdin+file ${spec.label}`,
      args: [...tokens, '-', second],
      stdin: { fixture: key },
    },
  ];
}

export function binaryCases(): CaseDescriptor[] {
  return BINARY_OPTION_SETS.map((tokens): CaseDescriptor => ({
    kind: 'compare',
    name: `matrix binary ${tokens.length > 0 ? tokens.join(' ') : '(none)'}`,
    args: [...tokens, placeholder('binary')],
  }));
}

export function matrixCases(specs: readonly OptionSpec[] = generateOptionSpecs()): CaseDescriptor[] {
  return [...specs.flatMap(casesForSpec), ...binaryCases()];
}
