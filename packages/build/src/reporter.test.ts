/**
 * @tessera/build — Reporter tests
 */

import { describe, it, expect } from 'vitest';
import type { Diagnostic } from '@tessera/compiler';
import { stripColors } from 'kolorist';
import type { BuildReport } from './builder';
import { formatDiagnostic, formatReport } from './reporter';

const ERROR: Diagnostic = {
  severity: 'error',
  unitId: 'B.tess',
  code: 'UnresolvedSymbolError',
  message: 'Unresolved symbol "x"',
  location: { line: 2, column: 5, offset: 20 },
};

const WARNING: Diagnostic = {
  severity: 'warning',
  unitId: 'A.tess',
  code: 'missing-logic',
  message: 'A.tess has no <script> section',
};

function report(ok: boolean, diagnostics: Diagnostic[]): BuildReport {
  const unit = (unitId: string, status: BuildReport['units'][number]['status']) => ({
    unitId,
    status,
    hash: '',
    artifacts: null,
    interface: null,
    diagnostics: [],
  });
  return {
    ok,
    units: [unit('A.tess', 'compiled'), unit('B.tess', ok ? 'cached' : 'failed'), unit('C.tess', 'cancelled')],
    diagnostics,
    pruned: [],
    compileCount: 1,
  };
}

describe('formatDiagnostic', () => {
  it('prints location, severity, code and message', () => {
    expect(formatDiagnostic(ERROR)).toBe('B.tess:2:5 error UnresolvedSymbolError Unresolved symbol "x"');
  });

  it('prints the unit alone without a location', () => {
    expect(formatDiagnostic(WARNING)).toBe('A.tess warning missing-logic A.tess has no <script> section');
  });

  it('only adds colour codes when asked', () => {
    expect(stripColors(formatDiagnostic(ERROR, { color: true }))).toBe(formatDiagnostic(ERROR));
  });
});

describe('formatReport', () => {
  it('lists errors before warnings and ends with a summary', () => {
    expect(formatReport(report(false, [WARNING, ERROR]))).toBe(
      [
        'B.tess:2:5 error UnresolvedSymbolError Unresolved symbol "x"',
        'A.tess warning missing-logic A.tess has no <script> section',
        'Build failed: 1 compiled, 0 cached, 1 failed, 1 cancelled',
      ].join('\n'),
    );
  });

  it('reports success with only the summary', () => {
    expect(formatReport(report(true, []))).toBe('Build succeeded: 1 compiled, 1 cached, 0 failed, 1 cancelled');
  });
});
