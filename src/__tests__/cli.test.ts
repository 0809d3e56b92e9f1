import fs from 'node:fs';
import path from 'node:path';

import { FmuArchive } from '../archive/fmuArchive';
import { REDUCTION_CONFIG_FILE } from '../batch/reductionConfig';
import { main, runList } from '../cli';
import { VERSION } from '../version';
import {
  type FixtureVariable,
  STANDARD_VARIABLES,
  makeTempDir,
  modelDescriptionXml,
  writeFmu,
} from './fixtures/fmuFixtures';

const XML = modelDescriptionXml(STANDARD_VARIABLES);

function cli(...args: string[]): Promise<number> {
  return main(['node', 'fmu-md', ...args]);
}

describe('CLI', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function logged(): string[] {
    return log.mock.calls.map((call: unknown[]) => String(call[0]));
  }

  describe('list', () => {
    test('prints one tab-separated line per variable', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      expect(await runList({ fmu, json: false })).toBe(0);
      expect(logged()).toEqual([
        'Var1\tReal\tparameter\t0',
        'count\tInteger\tparameter\t3',
        'enabled\tBoolean\tinput\tfalse',
        'label\tString\tparameter\tpump',
        'pos\tReal\toutput\t-',
      ]);
    });

    test('filters by causality and prints JSON', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      expect(await cli('list', fmu, '--causality', 'input', '--json')).toBe(0);
      expect(JSON.parse(logged()[0])).toEqual([
        { name: 'enabled', valueReference: 2, valueType: 'Boolean', causality: 'input', start: 'false' },
      ]);
    });

    test('an unknown causality is a usage error', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      expect(await cli('list', fmu, '--causality', 'sideways')).toBe(2);
    });
  });

  describe('set', () => {
    test('sets the start value in place', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      expect(await cli('-v', 'set', fmu, 'Var1', '42')).toBe(0);
      expect((await FmuArchive.open(fmu)).getScalarVariableByName('Var1').start).toBe(42);
      expect(logged()).toEqual([`Set Var1 start=42. Wrote: ${fmu}`]);
    });

    test('an unknown variable exits with 2 and names it', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      expect(await cli('set', fmu, 'nope', '1')).toBe(2);
      expect(error).toHaveBeenCalledWith('ScalarVariable not found: nope');
    });

    test('a value of the wrong type exits with 2 and leaves the file alone', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      const before = fs.readFileSync(fmu);
      expect(await cli('set', fmu, 'count', 'abc')).toBe(2);
      expect(fs.readFileSync(fmu).equals(before)).toBe(true);
    });
  });

  describe('delete', () => {
    test('deletes variables into another file', async () => {
      const dir = makeTempDir('fmu-md-cli-');
      const fmu = await writeFmu(dir, 'a.fmu', XML);
      const out = path.join(dir, 'b.fmu');
      expect(await cli('delete', fmu, 'Var1', 'label', '--out', out)).toBe(0);
      expect((await FmuArchive.open(out)).modelDescription.variableNames).toEqual(['count', 'enabled', 'pos']);
      expect((await FmuArchive.open(fmu)).modelDescription.variableNames).toHaveLength(5);
    });
  });

  describe('validate', () => {
    test('exits with 0 for a valid model description', async () => {
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', XML);
      expect(await cli('validate', fmu)).toBe(0);
      expect(logged()).toEqual([`${fmu}: valid`]);
    });

    test('exits with 1 and prints diagnostics for an invalid one', async () => {
      const broken: FixtureVariable = { ...STANDARD_VARIABLES[0], facets: 'unit="m" max="lots"' };
      const fmu = await writeFmu(makeTempDir('fmu-md-cli-'), 'a.fmu', modelDescriptionXml([broken]));
      expect(await cli('validate', fmu)).toBe(1);
      expect(logged()[0]).toMatch(/: \d+ schema error\(s\)$/);
      expect(logged().length).toBeGreaterThan(1);
    });
  });

  describe('reduce', () => {
    test('exits with 1 when a file fails and writes the report', async () => {
      const dir = makeTempDir('fmu-md-cli-');
      fs.writeFileSync(path.join(dir, REDUCTION_CONFIG_FILE), JSON.stringify({ delete_elements: ['Var1'] }));
      fs.writeFileSync(path.join(dir, 'bad.fmu'), 'not a zip');
      const good = await writeFmu(dir, 'good.fmu', XML);
      const reportFile = path.join(dir, 'report.json');

      expect(await cli('reduce', dir, '--report', reportFile)).toBe(1);

      expect((await FmuArchive.open(good)).modelDescription.variableNames).not.toContain('Var1');
      const report = JSON.parse(fs.readFileSync(reportFile, 'utf8'));
      expect(report.filesProcessed).toBe(1);
      expect(report.findings[0].location).toEqual({ file: 'bad.fmu' });
      expect(error).toHaveBeenCalledWith('Failed: bad.fmu');
    });

    test('exits with 0 when every file is reduced', async () => {
      const dir = makeTempDir('fmu-md-cli-');
      fs.writeFileSync(path.join(dir, REDUCTION_CONFIG_FILE), JSON.stringify({ delete_elements: ['label'] }));
      await writeFmu(dir, 'good.fmu', XML);
      const out = path.join(dir, 'out');

      expect(await cli('reduce', dir, '-o', out, '-s', 'r')).toBe(0);
      expect((await FmuArchive.open(path.join(out, 'good_r.fmu'))).modelDescription.variableNames).toEqual([
        'Var1',
        'count',
        'enabled',
        'pos',
      ]);
    });
  });

  test('a missing FMU exits with 2', async () => {
    const dir = makeTempDir('fmu-md-cli-');
    expect(await cli('validate', path.join(dir, 'missing.fmu'))).toBe(2);
    expect(error).toHaveBeenCalledTimes(1);
  });

  test('--version exits with 0', async () => {
    expect(await cli('--version')).toBe(0);
    expect(process.stdout.write).toHaveBeenCalledWith(`${VERSION}\n`);
  });
});
