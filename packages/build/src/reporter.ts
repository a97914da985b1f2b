/**
 * @tessera/build — Diagnostic reporter
 *
 * Renders diagnostics as `<unit>:<line>:<col> <severity> <code> <message>`
 * lines for terminals and logs.
 */

import { formatLocation, type Diagnostic } from '@tessera/compiler';
import { bold, dim, green, red, yellow } from 'kolorist';
import type { BuildReport } from './builder';

export interface ReportFormatOptions {
  /** Wrap parts of each line in ANSI colours. @default false */
  color?: boolean;
}

const plain = (text: string): string => text;

export function formatDiagnostic(diagnostic: Diagnostic, options: ReportFormatOptions = {}): string {
  const c = options.color ?? false;
  const severity =
    diagnostic.severity === 'error' ? (c ? red : plain)('error') : (c ? yellow : plain)('warning');
  const where = (c ? bold : plain)(formatLocation(diagnostic.unitId, diagnostic.location));
  return `${where} ${severity} ${(c ? dim : plain)(diagnostic.code)} ${diagnostic.message}`;
}

/**
 * All diagnostics of a build, errors first, followed by one summary line.
 */
export function formatReport(report: BuildReport, options: ReportFormatOptions = {}): string {
  const c = options.color ?? false;
  const ordered = [
    ...report.diagnostics.filter((d) => d.severity === 'error'),
    ...report.diagnostics.filter((d) => d.severity === 'warning'),
  ];

  const tally = (status: BuildReport['units'][number]['status']): number =>
    report.units.filter((unit) => unit.status === status).length;
  const counts =
    `${tally('compiled')} compiled, ${tally('cached')} cached, ` +
    `${tally('failed')} failed, ${tally('cancelled')} cancelled`;
  const summary = report.ok
    ? (c ? green : plain)(`Build succeeded: ${counts}`)
    : (c ? red : plain)(`Build failed: ${counts}`);

  return [...ordered.map((d) => formatDiagnostic(d, options)), summary].join('\n');
}
