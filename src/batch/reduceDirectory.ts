import fg from 'fast-glob';
import fs from 'node:fs/promises';
import path from 'node:path';

import { FmuArchive, FMU_EXTENSION } from '../archive/fmuArchive';
import { ConfigError, isFmuError } from '../errors';
import type { Causality } from '../model/scalarVariable';
import {
  addFinding,
  createEmptyReport,
  finalizeReport,
  type ReductionReport,
} from '../report/reductionReport';
import type { SchemaValidator } from '../schema/schemaValidator';
import { TOOL_NAME, VERSION } from '../version';
import { createDeletionSelector, loadReductionConfig, type ReductionConfig } from './reductionConfig';

export type ReduceOptions = {
  fmuDir: string;
  /** Where reduced archives go (created when missing). Default: in place. */
  outputDir?: string;
  /** Appended to each file stem as `_<suffix>`; a leading `_` is not doubled. */
  outputSuffix?: string;
  /** Only variables with this causality are candidates. `'any'` considers all of them. */
  causality?: Causality | 'any';
  /** Use this instead of reading `parameter_reduction_config.json` from `fmuDir`. */
  config?: ReductionConfig;
  validator?: SchemaValidator;
  log?: (message: string) => void;
};

function normalizeSuffix(suffix: string | undefined): string {
  if (!suffix) return '';
  return suffix.startsWith('_') ? suffix : `_${suffix}`;
}

async function assertDirectory(dir: string): Promise<void> {
  let isDir = false;
  try {
    isDir = (await fs.stat(dir)).isDirectory();
  } catch (e) {
    throw new ConfigError(`FMU directory does not exist: ${dir}`, { cause: e });
  }
  if (!isDir) throw new ConfigError(`Not a directory: ${dir}`);
}

/** `*.fmu` files directly inside `dir`, sorted. */
export async function listFmuFiles(dir: string): Promise<string[]> {
  const matches = await fg(`*${FMU_EXTENSION}`, { cwd: dir, onlyFiles: true, dot: false });
  return matches.sort((a, b) => a.localeCompare(b));
}

/**
 * Remove configured variables from every FMU in a directory.
 *
 * A variable is removed when it matches a delete pattern and no keep pattern. Failures of a single
 * file are recorded in the report and the batch moves on; anything that is not an FMU error aborts.
 */
export async function reduceModelDescriptionsInDirectory(opts: ReduceOptions): Promise<ReductionReport> {
  const fmuDir = path.resolve(opts.fmuDir);
  await assertDirectory(fmuDir);

  const config = opts.config ?? (await loadReductionConfig(fmuDir));
  const shouldDelete = createDeletionSelector(config);
  const outputDir = opts.outputDir ? path.resolve(opts.outputDir) : fmuDir;
  const suffix = normalizeSuffix(opts.outputSuffix);
  const causality = opts.causality ?? 'parameter';
  const log = opts.log ?? (() => undefined);

  if (outputDir !== fmuDir) {
    try {
      await fs.mkdir(outputDir, { recursive: true });
    } catch (e) {
      throw new ConfigError(`Cannot create output directory: ${outputDir}`, { cause: e });
    }
  }

  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, fmuDir, outputDir });
  const files = await listFmuFiles(fmuDir);
  report.filesScanned = files.length;

  if (files.length === 0) {
    addFinding(report, { kind: 'note', severity: 'info', message: `No ${FMU_EXTENSION} files in ${fmuDir}` });
  }

  for (const file of files) {
    const stem = path.basename(file, FMU_EXTENSION);
    const output = path.join(outputDir, `${stem}${suffix}${FMU_EXTENSION}`);
    try {
      const archive = await FmuArchive.open(path.join(fmuDir, file), { validator: opts.validator });
      const candidates = archive.queryScalarVariables(causality === 'any' ? {} : { causality });
      const removed = candidates.map((v) => v.name).filter(shouldDelete);
      for (const name of removed) archive.deleteVariable(name);

      await archive.saveFmu(output);
      report.files.push({ file, output, removed, remaining: archive.scalarVariables.length });
      report.filesProcessed += 1;
      log(`${file}: removed ${removed.length} variable(s), wrote ${output}`);
    } catch (e) {
      if (!isFmuError(e)) throw e;
      addFinding(report, { kind: e.code, severity: 'error', message: e.message, location: { file } });
      log(`${file}: ${e.message}`);
    }
  }

  return finalizeReport(report);
}
