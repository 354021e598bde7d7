import type { Adjacency, CapacitatedGraph } from './graph.js';
import type { ResidualGraph } from './residual.js';

/** Realized flow per original edge, `from -> (to -> flow)` */
export type FlowMatrix = Adjacency;

/**
 * Realized flow on every original edge: capacity minus final residual,
 * clamped at zero. Zero-flow edges are kept so the matrix covers the graph.
 */
export function extractFlowMatrix(graph: CapacitatedGraph, residual: ResidualGraph): FlowMatrix {
    const flows: FlowMatrix = new Map();
    for (const { from, to, capacity } of graph.edges()) {
        const remaining = residual.get(from)?.get(to) ?? capacity;
        let row = flows.get(from);
        if (!row) {
            row = new Map();
            flows.set(from, row);
        }
        row.set(to, Math.max(0, capacity - remaining));
    }
    return flows;
}

export function getFlow(flows: FlowMatrix, from: string, to: string): number {
    return flows.get(from)?.get(to) ?? 0;
}

/** Flow entering `node` across all matrix rows */
export function inflow(flows: FlowMatrix, node: string): number {
    let total = 0;
    for (const row of flows.values()) total += row.get(node) ?? 0;
    return total;
}

/** Flow leaving `node` */
export function outflow(flows: FlowMatrix, node: string): number {
    let total = 0;
    for (const f of flows.get(node)?.values() ?? []) total += f;
    return total;
}
