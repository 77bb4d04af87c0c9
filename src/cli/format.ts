import type { SBoxDiagnostics } from '../shared/engine';

export interface SBoxReport {
  sideLength: number;
  iterations: number;
  seed: number | undefined;
  diagnostics: SBoxDiagnostics;
  example: { input: number; output: number };
}

export function renderConsoleReport(report: SBoxReport): string {
  const { diagnostics, example } = report;
  return [
    `S-Box ${report.sideLength}x${report.sideLength}, ${report.iterations} iterations` +
      (report.seed === undefined ? '' : `, seed ${report.seed}`),
    '',
    'S-Box Statistics:',
    `isBijective: ${diagnostics.isBijective}`,
    `min: ${diagnostics.min}`,
    `max: ${diagnostics.max}`,
    `mean: ${diagnostics.mean}`,
    `stdDev: ${diagnostics.stdDev}`,
    `fixedPoints: ${diagnostics.fixedPoints}`,
    '',
    'Example substitution:',
    `Input: ${example.input}`,
    `Output: ${example.output}`,
  ].join('\n');
}
