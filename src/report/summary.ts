/**
 * Markdown summary of a solved tiered network
 */

import type { TieredSolution } from '../network/tiered.js';
import { compareNodeIds, roundTo } from './attribution.js';

export function renderSummary(solution: TieredSolution, precision: number = 0): string {
    const { network, totalFlow, minCut, totals, hubThroughput } = solution;
    const fmt = (v: number) => String(roundTo(v, precision));
    const lines: string[] = [];

    lines.push('# Max-flow summary', '');
    lines.push(`- **Maximum flow**: ${totalFlow}`);
    lines.push(`- **Min-cut capacity**: ${minCut.capacity}`);
    lines.push(`- **Tiers**: sources ${network.upstream.length}, hubs ${network.hubs.length}, consumers ${network.downstream.length}`);
    lines.push('');

    lines.push('## Min-cut edges', '');
    lines.push('| From | To | Capacity |', '| --- | --- | ---: |');
    for (const e of minCut.edges) {
        lines.push(`| ${e.from} | ${e.to} | ${e.capacity} |`);
    }
    lines.push('');

    lines.push('## Delivered by source', '');
    lines.push('| Source | Flow |', '| --- | ---: |');
    for (const source of [...network.upstream].sort(compareNodeIds)) {
        lines.push(`| ${source} | ${fmt(totals.bySource.get(source) ?? 0)} |`);
    }
    lines.push('');

    lines.push('## Hub throughput', '');
    lines.push('| Hub | Flow |', '| --- | ---: |');
    for (const hub of network.hubs) {
        lines.push(`| ${hub} | ${hubThroughput.get(hub) ?? 0} |`);
    }

    return lines.join('\n') + '\n';
}
