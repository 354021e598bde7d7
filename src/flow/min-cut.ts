import type { CapacitatedGraph, Edge, NodeId } from './graph.js';
import type { ResidualGraph } from './residual.js';

export interface MinCut {
    /** Nodes still reachable from the source in the saturated residual graph */
    sourceSide: Set<NodeId>;
    sinkSide: Set<NodeId>;
    /** Original edges crossing from the source side to the sink side */
    edges: Edge[];
    capacity: number;
}

/**
 * Read the minimum cut off a residual graph that has no augmenting path left.
 */
export function findMinCut(graph: CapacitatedGraph, residual: ResidualGraph, source: NodeId): MinCut {
    const sourceSide = new Set<NodeId>([source]);
    const queue: NodeId[] = [source];
    let head = 0;

    while (head < queue.length) {
        const u = queue[head++];
        if (u === undefined) break;
        for (const [v, cap] of residual.get(u) ?? []) {
            if (cap > 0 && !sourceSide.has(v)) {
                sourceSide.add(v);
                queue.push(v);
            }
        }
    }

    const sinkSide = new Set(graph.nodes().filter(n => !sourceSide.has(n)));
    const edges: Edge[] = [];
    let capacity = 0;
    for (const edge of graph.edges()) {
        if (sourceSide.has(edge.from) && sinkSide.has(edge.to)) {
            edges.push(edge);
            capacity += edge.capacity;
        }
    }

    return { sourceSide, sinkSide, edges, capacity };
}
