import type { NodeId } from './graph.js';
import type { ResidualGraph } from './residual.js';

export interface AugmentingPath {
    /** Smallest residual capacity along the path */
    bottleneck: number;
    /** BFS tree; the source maps to null */
    predecessors: Map<NodeId, NodeId | null>;
    /** Nodes from source to sink */
    path: NodeId[];
}

/**
 * Breadth-first search for the shortest (by edge count) augmenting path.
 *
 * Only edges with strictly positive residual capacity are followed and each
 * node keeps the predecessor it was first discovered from. Returns null once
 * the sink is unreachable, which is how the solver knows the flow is maximal.
 */
export function findAugmentingPath(
    residual: ResidualGraph,
    source: NodeId,
    sink: NodeId
): AugmentingPath | null {
    const predecessors = new Map<NodeId, NodeId | null>([[source, null]]);
    const queue: NodeId[] = [source];
    let head = 0;

    while (head < queue.length) {
        const u = queue[head++];
        if (u === undefined) break;

        for (const [v, cap] of residual.get(u) ?? []) {
            if (cap <= 0 || predecessors.has(v)) continue;
            predecessors.set(v, u);
            if (v === sink) {
                return traceBack(residual, predecessors, source, sink);
            }
            queue.push(v);
        }
    }

    return null;
}

function traceBack(
    residual: ResidualGraph,
    predecessors: Map<NodeId, NodeId | null>,
    source: NodeId,
    sink: NodeId
): AugmentingPath {
    const path: NodeId[] = [sink];
    let bottleneck = Infinity;
    let curr = sink;
    let prev = predecessors.get(curr);

    while (prev !== null && prev !== undefined) {
        bottleneck = Math.min(bottleneck, residual.get(prev)?.get(curr) ?? 0);
        path.push(prev);
        curr = prev;
        prev = predecessors.get(curr);
    }

    if (curr !== source) {
        throw new Error(`Broken predecessor chain: ${sink} does not lead back to ${source}`);
    }

    path.reverse();
    return { bottleneck, predecessors, path };
}
