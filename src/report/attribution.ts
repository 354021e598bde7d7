import type { AttributionTable } from '../flow/index.js';

export interface AttributionRow {
    source: string;
    consumer: string;
    flow: number;
}

export interface RowOptions {
    /** Decimal places kept after rounding (0 = whole units) */
    precision?: number;
}

const collator = new Intl.Collator('en', { numeric: true });

export function roundTo(value: number, precision: number): number {
    const factor = 10 ** precision;
    return Math.round(value * factor) / factor;
}

/**
 * Flatten an attribution table into rounded rows, grouped by source with
 * consumers in natural order (M2 before M10). Rounded per-pair values need
 * not add up exactly to node-level flows.
 */
export function buildAttributionRows(table: AttributionTable, options: RowOptions = {}): AttributionRow[] {
    const precision = options.precision ?? 0;
    const rows: AttributionRow[] = [];
    for (const [source, row] of table) {
        for (const [consumer, value] of row) {
            if (value > 0) {
                rows.push({ source, consumer, flow: roundTo(value, precision) });
            }
        }
    }
    rows.sort((a, b) => collator.compare(a.source, b.source) || collator.compare(a.consumer, b.consumer));
    return rows;
}

export function compareNodeIds(a: string, b: string): number {
    return collator.compare(a, b);
}
