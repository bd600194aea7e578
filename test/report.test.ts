import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { aggregateProject, type AnalysisReport } from '../src/analysis/aggregator.js';
import { renderTextReport } from '../src/report/text.js';
import { toJsonReport, serializeReport } from '../src/report/json.js';
import { writeReportFile, ReportWriteError } from '../src/report/writer.js';
import type { FileAnalysis } from '../src/parser/types.js';

function fileAnalysis(filePath: string, partial: Partial<FileAnalysis> = {}): FileAnalysis {
  return {
    filePath,
    definitions: [],
    uses: [],
    attributeNames: [],
    imports: [],
    importEdges: [],
    diagnostics: [],
    skipped: false,
    ...partial,
  };
}

function sampleReport(): AnalysisReport {
  return aggregateProject([
    fileAnalysis('a.py', {
      importEdges: [{ source: 'a.py', target: 'b.py', line: 1 }],
      uses: [{ name: 'ghost', line: 3, scopeId: 0, resolvedLocally: false }],
    }),
    fileAnalysis('b.py', {
      importEdges: [{ source: 'b.py', target: 'a.py', line: 1 }],
      definitions: [{ name: 'orphan', line: 2, kind: 'function', scopeId: 0, scopeKind: 'module' }],
    }),
    fileAnalysis('c.py', {
      diagnostics: [{
        kind: 'wildcard-import',
        filePath: 'c.py',
        line: 1,
        message: 'Wildcard import from os hides which names it defines',
      }],
    }),
  ]);
}

describe('renderTextReport', () => {
  it('renders every section', () => {
    expect(renderTextReport(sampleReport())).toBe([
      '=== Project Analysis Results ===',
      'Files: 3 analyzed, 0 skipped',
      '',
      'Undefined Symbols (1):',
      '  a.py:3 -> ghost',
      '',
      'Unused Symbols (1):',
      '  b.py:2 -> orphan (function)',
      '',
      'Circular Imports (1):',
      '  Cycle 1: a.py -> b.py -> a.py',
      '',
      'Coupling Metrics (3):',
      '  Module  Ca    Ce    I',
      '  ' + '-'.repeat(25),
      '  a.py    1     1     0.50',
      '  b.py    1     1     0.50',
      '  c.py    0     0     0.00',
      '',
      'Diagnostics (1):',
      '  [wildcard-import] c.py:1 Wildcard import from os hides which names it defines',
      '',
    ].join('\n'));
  });

  it('leaves out the diagnostics section when there are none', () => {
    const report = aggregateProject([fileAnalysis('solo.py')]);
    expect(renderTextReport(report)).not.toContain('Diagnostics');
  });
});

describe('toJsonReport', () => {
  it('uses stable snake_case fields', () => {
    expect(toJsonReport(sampleReport())).toEqual({
      undefined_symbols: [{ symbol: 'ghost', file: 'a.py', line: 3 }],
      unused_symbols: [{ symbol: 'orphan', file: 'b.py', line: 2, kind: 'function' }],
      circular_imports: [['a.py', 'b.py', 'a.py']],
      coupling_metrics: [
        { module: 'a.py', ca: 1, ce: 1, instability: 0.5 },
        { module: 'b.py', ca: 1, ce: 1, instability: 0.5 },
        { module: 'c.py', ca: 0, ce: 0, instability: 0 },
      ],
      diagnostics: [{
        kind: 'wildcard-import',
        file: 'c.py',
        line: 1,
        message: 'Wildcard import from os hides which names it defines',
      }],
      dependencies: { 'a.py': ['b.py'], 'b.py': ['a.py'], 'c.py': [] },
      project_symbols: { orphan: ['b.py'] },
      summary: {
        files_analyzed: 3,
        files_skipped: 0,
        definitions: 1,
        uses: 1,
        import_edges: 2,
      },
    });
  });

  it('puts the most unstable files first', () => {
    const report = aggregateProject([
      fileAnalysis('core.py'),
      fileAnalysis('app.py', { importEdges: [{ source: 'app.py', target: 'core.py', line: 1 }] }),
    ]);

    expect(toJsonReport(report).coupling_metrics.map(m => m.module)).toEqual(['app.py', 'core.py']);
  });

  it('serializes to parseable JSON', () => {
    const parsed: unknown = JSON.parse(serializeReport(sampleReport()));
    expect(parsed).toEqual(toJsonReport(sampleReport()));
  });
});

describe('writeReportFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pyxref-report-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes and replaces the file without leaving temporaries', () => {
    const target = join(dir, 'report.json');
    writeFileSync(target, 'old');

    writeReportFile(target, '{"ok":true}');

    expect(readFileSync(target, 'utf-8')).toBe('{"ok":true}');
    expect(readdirSync(dir)).toEqual(['report.json']);
  });

  it('raises ReportWriteError when the directory is missing', () => {
    const target = join(dir, 'missing', 'report.json');

    expect(() => writeReportFile(target, '{}')).toThrow(ReportWriteError);
  });

  it('leaves the existing target alone when the rename fails', () => {
    const target = join(dir, 'out');
    mkdirSync(target);
    writeFileSync(join(target, 'keep.txt'), 'keep');

    let error: unknown;
    try {
      writeReportFile(target, 'new');
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ReportWriteError);
    expect(error instanceof ReportWriteError && error.kind).toBe('sink-write-failure');
    expect(readFileSync(join(target, 'keep.txt'), 'utf-8')).toBe('keep');
    expect(readdirSync(dir)).toEqual(['out']);
  });
});
