import { reportToMarkdown } from '../markdownReport';
import { createEmptyReport } from '../reductionReport';

describe('markdownReport', () => {
  test('renders stable sections even when empty', () => {
    const r = createEmptyReport({ toolName: 'fmu-md', toolVersion: '0.0.0', fmuDir: '/x', startedAtIso: 'T0' });
    const md = reportToMarkdown(r);

    expect(md.split('\n').slice(0, 3)).toEqual(['# Reduction report', '', '- Tool: **fmu-md** 0.0.0']);
    expect(md).toContain('- Output directory: `/x`');
    expect(md).toContain('- Variables removed: **0**');
    expect(md).toContain('| (none) | 0 | 0 |  |');
    expect(md).toContain('| (none) | 0 |\n');
    expect(md).toContain('| (none) | (none) |  |  |');
    expect(md).not.toContain('## Removed variables');
  });

  test('lists files, removed variables and totals', () => {
    const r = createEmptyReport({ toolName: 'fmu-md', toolVersion: '0.0.0', fmuDir: '/in', outputDir: '/out' });
    r.filesScanned = 2;
    r.filesProcessed = 2;
    r.files.push(
      { file: 'b.fmu', output: '/out/b.fmu', removed: [], remaining: 4 },
      { file: 'a.fmu', output: '/out/a.fmu', removed: ['pipe.d', 'pipe.L'], remaining: 1 },
    );
    const md = reportToMarkdown(r);

    expect(md).toContain('- Variables removed: **2**');
    expect(md.indexOf('| a.fmu | 2 | 1 | `/out/a.fmu` |')).toBeLessThan(md.indexOf('| b.fmu | 0 | 4 | `/out/b.fmu` |'));
    expect(md).toContain('### a.fmu\n\n- `pipe.d`\n- `pipe.L`\n');
    expect(md).not.toContain('### b.fmu');
  });

  test('escapes pipes and sorts findings deterministically', () => {
    const r = createEmptyReport({ toolName: 'fmu-md', toolVersion: '0.0.0', fmuDir: '/x' });
    r.findings.push(
      { kind: 'PARSE', severity: 'error', message: 'bad|name', location: { file: 'b.fmu' } },
      { kind: 'note', severity: 'info', message: 'A note' },
      { kind: 'PARSE', severity: 'error', message: 'bad|name', location: { file: 'a.fmu' } },
    );
    const md = reportToMarkdown(r);

    expect(md).toContain('- Findings: **3** (errors: **2**)');
    expect(md).toContain('| PARSE | 2 |');
    expect(md).toContain('| note | 1 |');

    const idxA = md.indexOf('| error | PARSE | a.fmu | bad\\|name |');
    const idxB = md.indexOf('| error | PARSE | b.fmu | bad\\|name |');
    const idxNote = md.indexOf('| info | note |  | A note |');
    // Sorted by kind (locale order, so `note` before `PARSE`), then file.
    expect(idxNote).toBeGreaterThan(0);
    expect(idxNote).toBeLessThan(idxA);
    expect(idxA).toBeLessThan(idxB);
  });
});
