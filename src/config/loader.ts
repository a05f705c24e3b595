import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { suiteFileSchema } from '../schema/suite.js';
import type { SuiteFile } from '../schema/suite.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a suite file (YAML, or JSON by extension).
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadSuiteFile(suitePath: string): Promise<SuiteFile> {
  const raw = await readFile(suitePath, 'utf-8');
  return parseSuiteSource(raw, suitePath.endsWith('.json') ? 'json' : 'yaml');
}

export function parseSuiteSource(raw: string, format: 'json' | 'yaml'): SuiteFile {
  const parsed: unknown = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  return suiteFileSchema.parse(parsed);
}
