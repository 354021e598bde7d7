import type { AttributionTable, CapacitatedGraph, FlowMatrix, MinCut, ResidualGraph } from '../../flow/index.js';
import { compareNodeIds, roundTo } from '../../report/index.js';

export interface EdgeFlow {
    from: string;
    to: string;
    flow: number;
    capacity: number;
}

export function flowList(graph: CapacitatedGraph, flows: FlowMatrix): EdgeFlow[] {
    const list: EdgeFlow[] = [];
    for (const { from, to, capacity } of graph.edges()) {
        list.push({ from, to, capacity, flow: flows.get(from)?.get(to) ?? 0 });
    }
    return list;
}

// Object.fromEntries defines own keys, so ids like `__proto__` survive
export function adjacencyToRecord(adj: ResidualGraph): Record<string, Record<string, number>> {
    return Object.fromEntries([...adj].map(([u, row]) => [u, Object.fromEntries(row)] as const));
}

export function matrixFromList(edges: ReadonlyArray<{ from: string; to: string; flow: number }>): FlowMatrix {
    const matrix: FlowMatrix = new Map();
    for (const e of edges) {
        let row = matrix.get(e.from);
        if (!row) {
            row = new Map();
            matrix.set(e.from, row);
        }
        row.set(e.to, (row.get(e.to) ?? 0) + e.flow);
    }
    return matrix;
}

export function serializeMinCut(cut: MinCut) {
    return {
        capacity: cut.capacity,
        sourceSide: [...cut.sourceSide].sort(compareNodeIds),
        sinkSide: [...cut.sinkSide].sort(compareNodeIds),
        edges: cut.edges,
    };
}

export function attributionToRecord(table: AttributionTable, precision?: number): Record<string, Record<string, number>> {
    const round = (value: number) => precision === undefined ? value : roundTo(value, precision);
    return Object.fromEntries([...table].map(([source, row]) => [
        source,
        Object.fromEntries([...row].map(([consumer, value]) => [consumer, round(value)] as const)),
    ] as const));
}
