#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { FmuArchive } from './archive/fmuArchive';
import { reduceModelDescriptionsInDirectory } from './batch/reduceDirectory';
import { CAUSALITIES, type Causality, isOneOf } from './model/scalarVariable';
import { failedFiles } from './report/reductionReport';
import { writeReportFile } from './report/writeReport';
import { formatDiagnostic } from './schema/validationResult';
import { stableStringify } from './util/deterministicJson';
import { TOOL_NAME, VERSION } from './version';

type CausalityFilter = Causality | 'any';

function parseCausality(v: string): CausalityFilter {
  if (v === 'any' || isOneOf(CAUSALITIES, v)) return v;
  throw new InvalidArgumentError(`Expected one of: any, ${CAUSALITIES.join(', ')}`);
}

function verboseLog(verbose: boolean): (message: string) => void {
  // eslint-disable-next-line no-console
  return verbose ? (message) => console.log(message) : () => undefined;
}

export type ListOptions = {
  fmu: string;
  causality?: CausalityFilter;
  json: boolean;
};

export async function runList(opts: ListOptions): Promise<number> {
  const archive = await FmuArchive.open(opts.fmu);
  const causality = opts.causality === 'any' ? undefined : opts.causality;
  const summaries = archive.queryScalarVariables({ causality }).map((v) => v.toSummary());

  if (opts.json) {
    // eslint-disable-next-line no-console
    console.log(stableStringify(summaries).trimEnd());
    return 0;
  }
  for (const s of summaries) {
    // eslint-disable-next-line no-console
    console.log([s.name, s.valueType, s.causality ?? '-', s.start ?? '-'].join('\t'));
  }
  return 0;
}

export type SetOptions = {
  fmu: string;
  name: string;
  value: string;
  out?: string;
  verbose: boolean;
};

export async function runSet(opts: SetOptions): Promise<number> {
  const archive = await FmuArchive.open(opts.fmu);
  const updated = archive.setStartValue(opts.name, opts.value);
  const written = await archive.saveFmu(opts.out);
  verboseLog(opts.verbose)(`Set ${updated.name} start=${updated.toSummary().start ?? ''}. Wrote: ${written}`);
  return 0;
}

export type DeleteOptions = {
  fmu: string;
  names: string[];
  out?: string;
  verbose: boolean;
};

export async function runDelete(opts: DeleteOptions): Promise<number> {
  const archive = await FmuArchive.open(opts.fmu);
  for (const name of opts.names) archive.deleteVariable(name);
  const written = await archive.saveFmu(opts.out);
  verboseLog(opts.verbose)(`Deleted ${opts.names.length} variable(s). Wrote: ${written}`);
  return 0;
}

export type ValidateOptions = {
  fmu: string;
};

export async function runValidate(opts: ValidateOptions): Promise<number> {
  const archive = await FmuArchive.open(opts.fmu);
  const result = await archive.validate();
  if (result.valid) {
    // eslint-disable-next-line no-console
    console.log(`${opts.fmu}: valid`);
    return 0;
  }
  // eslint-disable-next-line no-console
  console.log(`${opts.fmu}: ${result.diagnostics.length} schema error(s)`);
  for (const d of result.diagnostics) {
    // eslint-disable-next-line no-console
    console.log(`  ${formatDiagnostic(d)}`);
  }
  return 1;
}

export type ReduceCliOptions = {
  dir: string;
  outputDir?: string;
  outputSuffix?: string;
  causality?: CausalityFilter;
  report?: string;
  verbose: boolean;
};

export async function runReduce(opts: ReduceCliOptions): Promise<number> {
  const report = await reduceModelDescriptionsInDirectory({
    fmuDir: opts.dir,
    outputDir: opts.outputDir,
    outputSuffix: opts.outputSuffix,
    causality: opts.causality,
    log: verboseLog(opts.verbose),
  });
  if (opts.report) await writeReportFile(opts.report, report);

  const failed = failedFiles(report);
  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(`Processed ${report.filesProcessed}/${report.filesScanned} FMU(s) (failed: ${failed.length})`);
    if (opts.report) {
      // eslint-disable-next-line no-console
      console.log(`Wrote report: ${opts.report}`);
    }
  }
  for (const file of failed) {
    // eslint-disable-next-line no-console
    console.error(`Failed: ${file}`);
  }
  return failed.length > 0 ? 1 : 0;
}

type VerboseFlag = { verbose?: boolean };
type OutFlag = { out?: string };

export function buildProgram(setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Inspect and edit modelDescription.xml inside FMI 2.0 .fmu archives')
    .version(VERSION)
    .option('-v, --verbose', 'Verbose logging', false)
    .exitOverride();

  const verbose = (): boolean => Boolean(program.opts<VerboseFlag>().verbose);

  program
    .command('list')
    .description('Print the ScalarVariables of an FMU')
    .argument('<fmu>', 'FMU file')
    .option('--causality <causality>', 'Only variables with this causality (or "any")', parseCausality)
    .option('--json', 'Print JSON summaries', false)
    .action(async (fmu: string, raw: { causality?: CausalityFilter; json?: boolean }) => {
      setExitCode(await runList({ fmu, causality: raw.causality, json: Boolean(raw.json) }));
    });

  program
    .command('set')
    .description('Set the start value of a variable and save')
    .argument('<fmu>', 'FMU file')
    .argument('<name>', 'Variable name')
    .argument('<value>', 'New start value')
    .option('--out <file>', 'Write to this file instead of the source')
    .action(async (fmu: string, name: string, value: string, raw: OutFlag) => {
      setExitCode(await runSet({ fmu, name, value, out: raw.out, verbose: verbose() }));
    });

  program
    .command('delete')
    .description('Delete variables and save')
    .argument('<fmu>', 'FMU file')
    .argument('<names...>', 'Variable names')
    .option('--out <file>', 'Write to this file instead of the source')
    .action(async (fmu: string, names: string[], raw: OutFlag) => {
      setExitCode(await runDelete({ fmu, names, out: raw.out, verbose: verbose() }));
    });

  program
    .command('validate')
    .description('Validate modelDescription.xml against the FMI 2.0 schema')
    .argument('<fmu>', 'FMU file')
    .action(async (fmu: string) => {
      setExitCode(await runValidate({ fmu }));
    });

  program
    .command('reduce')
    .description('Remove variables selected by parameter_reduction_config.json from every FMU in a directory')
    .argument('<dir>', 'Directory holding the .fmu files and the config')
    .option('-o, --output-dir <dir>', 'Write reduced FMUs here (default: in place)')
    .option('-s, --output-suffix <suffix>', 'Append _<suffix> to output file names')
    .option('--causality <causality>', 'Candidate causality (default parameter, "any" for all)', parseCausality)
    .option('--report <file>', 'Write a report (.json or Markdown)')
    .action(
      async (
        dir: string,
        raw: { outputDir?: string; outputSuffix?: string; causality?: CausalityFilter; report?: string },
      ) => {
        setExitCode(
          await runReduce({
            dir,
            outputDir: raw.outputDir,
            outputSuffix: raw.outputSuffix,
            causality: raw.causality,
            report: raw.report,
            verbose: verbose(),
          }),
        );
      },
    );

  return program;
}

export async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = buildProgram((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // Commander has already printed usage problems; help and version exit with 0.
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 2;
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    });
}
