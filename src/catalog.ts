/**
 * Hand-written cases, kept as data in cases/catalog.json and validated on load.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { CatalogSchema, catalogToDescriptors, type CaseDescriptor } from './cases.js';
import { ConfigError, describeCause, formatIssues } from './errors.js';

/** Resolves the same from src/ and from dist/ */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../cases/catalog.json', import.meta.url));

export function parseCatalog(raw: string, source = 'catalog'): CaseDescriptor[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${describeCause(error)}`, { cause: error });
  }

  const parsed = CatalogSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`${source} failed validation: ${formatIssues(parsed.error)}`);
  }
  return catalogToDescriptors(parsed.data);
}

export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): CaseDescriptor[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`reading case catalog ${path}: ${describeCause(error)}`, { cause: error });
  }
  return parseCatalog(raw, path);
}
