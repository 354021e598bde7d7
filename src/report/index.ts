/**
 * Report rendering and persistence
 */

import { mkdirSync, writeFileSync } from 'fs';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { InvalidOutputPathError } from '../flow/index.js';
import type { TieredSolution } from '../network/tiered.js';
import { buildAttributionRows, type AttributionRow } from './attribution.js';
import { toCsv } from './csv.js';
import { renderSummary } from './summary.js';

export * from './attribution.js';
export * from './csv.js';
export * from './summary.js';

export const DEFAULT_CSV_HEADER = ['Source', 'Consumer', 'Flow'] as const;

export interface ReportOptions {
    precision?: number;
    csvHeader?: readonly string[];
}

export interface Report {
    rows: AttributionRow[];
    csv: string;
    summary: string;
}

export function buildReport(solution: TieredSolution, options: ReportOptions = {}): Report {
    const precision = options.precision ?? 0;
    const rows = buildAttributionRows(solution.attribution, { precision });
    const csv = toCsv(
        options.csvHeader ?? DEFAULT_CSV_HEADER,
        rows.map(r => [r.source, r.consumer, r.flow])
    );
    return { rows, csv, summary: renderSummary(solution, precision) };
}

/**
 * Resolve `requested` against `root`, refusing anything that lands outside it.
 */
export function resolveOutputDir(root: string, requested: string): string {
    const base = resolve(root);
    const target = resolve(base, requested);
    const rel = relative(base, target);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        throw new InvalidOutputPathError(requested, base);
    }
    return target;
}

/**
 * Write `attribution.csv` and `SUMMARY.md` into `dir`, creating it if needed.
 * Returns the written paths.
 */
export function writeReport(dir: string, report: Report): { csvPath: string; summaryPath: string } {
    mkdirSync(dir, { recursive: true });
    const csvPath = join(dir, 'attribution.csv');
    const summaryPath = join(dir, 'SUMMARY.md');
    writeFileSync(csvPath, report.csv, 'utf-8');
    writeFileSync(summaryPath, report.summary, 'utf-8');
    return { csvPath, summaryPath };
}
