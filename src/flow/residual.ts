import type { Adjacency, CapacitatedGraph } from './graph.js';

/**
 * Residual graph: `node -> (node -> remaining capacity)`, mutated in place by
 * the solver. For every present (u, v) a reciprocal (v, u) exists.
 */
export type ResidualGraph = Adjacency;

/**
 * Build a fresh residual graph from the capacitated graph.
 *
 * Forward capacities are copied first and reverse entries filled afterwards,
 * so a genuine opposite edge keeps its capacity whatever order the pair was
 * inserted in.
 */
export function buildResidual(graph: CapacitatedGraph): ResidualGraph {
    const residual: ResidualGraph = new Map();
    for (const node of graph.nodes()) {
        residual.set(node, new Map(graph.successors(node)));
    }

    for (const edge of graph.edges()) {
        const back = residual.get(edge.to);
        if (back && !back.has(edge.from)) {
            back.set(edge.from, 0);
        }
    }

    return residual;
}

export function residualCapacity(residual: ResidualGraph, from: string, to: string): number {
    return residual.get(from)?.get(to) ?? 0;
}
