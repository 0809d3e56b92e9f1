import Ajv from 'ajv/dist/2020';
import fs from 'node:fs/promises';
import path from 'node:path';
import picomatch from 'picomatch';

import { ConfigError } from '../errors';
import configSchema from './schema/parameter-reduction-config.schema.json';

export const REDUCTION_CONFIG_FILE = 'parameter_reduction_config.json';

/** A name glob, or `{ component: [param, …] }` expanded to `component.param` globs. */
export type PatternEntry = string | Record<string, string[]>;

type RawReductionConfig = {
  keep_elements?: PatternEntry[];
  delete_elements?: PatternEntry[];
};

export type ReductionConfig = {
  keepPatterns: string[];
  deletePatterns: string[];
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRawConfig = ajv.compile<RawReductionConfig>(configSchema);

export function expandPatterns(entries: PatternEntry[]): string[] {
  const out: string[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      out.push(entry);
      continue;
    }
    for (const [component, params] of Object.entries(entry)) {
      for (const param of params) out.push(`${component}.${param}`);
    }
  }
  return out;
}

export function parseReductionConfig(raw: unknown, source: string = REDUCTION_CONFIG_FILE): ReductionConfig {
  if (!validateRawConfig(raw)) {
    throw new ConfigError(`Invalid ${source}: ${ajv.errorsText(validateRawConfig.errors)}`);
  }
  return {
    keepPatterns: expandPatterns(raw.keep_elements ?? []),
    deletePatterns: expandPatterns(raw.delete_elements ?? []),
  };
}

/** Read `parameter_reduction_config.json` from `dir`. */
export async function loadReductionConfig(dir: string): Promise<ReductionConfig> {
  const file = path.join(dir, REDUCTION_CONFIG_FILE);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`Cannot read ${file}`, { cause: e });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`${file} is not valid JSON`, { cause: e });
  }
  return parseReductionConfig(raw, file);
}

/**
 * Shell-style name matcher. `*` also matches across `/`, so patterns behave the same for flat and
 * hierarchical variable names.
 */
export function createNameMatcher(patterns: string[]): (name: string) => boolean {
  if (patterns.length === 0) return () => false;
  return picomatch(patterns, { dot: true, bash: true });
}

/** A name is selected when it matches a delete pattern and no keep pattern. */
export function createDeletionSelector(config: ReductionConfig): (name: string) => boolean {
  const deleteMatch = createNameMatcher(config.deletePatterns);
  const keepMatch = createNameMatcher(config.keepPatterns);
  return (name) => deleteMatch(name) && !keepMatch(name);
}
