/**
 * Edmonds-Karp maximum flow
 *
 * Repeated BFS augmentation over a residual graph built fresh for each call.
 * The capacitated graph is only read. With integer capacities every
 * augmentation raises the total by at least one and the loop runs O(V·E)
 * times.
 */

import { InvalidEndpointsError } from './errors.js';
import type { CapacitatedGraph, NodeId } from './graph.js';
import { buildResidual, type ResidualGraph } from './residual.js';
import { findAugmentingPath } from './path-finder.js';
import { extractFlowMatrix, type FlowMatrix } from './extractor.js';

export interface Augmentation {
    path: NodeId[];
    bottleneck: number;
    /** Total flow after this augmentation */
    totalAfter: number;
}

export interface MaxFlowResult {
    totalFlow: number;
    flowMatrix: FlowMatrix;
    residual: ResidualGraph;
    augmentations: Augmentation[];
}

export function assertEndpoints(graph: CapacitatedGraph, source: NodeId, sink: NodeId): void {
    if (source === sink) {
        throw new InvalidEndpointsError(`Source and sink must differ, both are ${source}`, source, sink);
    }
    for (const node of [source, sink]) {
        if (!graph.hasNode(node)) {
            throw new InvalidEndpointsError(`Node ${node} is not in the graph`, source, sink);
        }
    }
}

export function maxFlow(graph: CapacitatedGraph, source: NodeId, sink: NodeId): MaxFlowResult {
    assertEndpoints(graph, source, sink);

    const residual = buildResidual(graph);
    const augmentations: Augmentation[] = [];
    let totalFlow = 0;

    for (;;) {
        const found = findAugmentingPath(residual, source, sink);
        if (!found) break;

        const b = found.bottleneck;
        totalFlow += b;

        // Walk the path backwards: spend forward capacity, open the reverse edge
        let v = sink;
        let u = found.predecessors.get(v);
        while (u !== null && u !== undefined) {
            const forward = residual.get(u);
            const backward = residual.get(v);
            if (!forward || !backward) {
                throw new Error(`Residual graph lost entry for ${u} -> ${v}`);
            }
            forward.set(v, (forward.get(v) ?? 0) - b);
            backward.set(u, (backward.get(u) ?? 0) + b);
            v = u;
            u = found.predecessors.get(v);
        }

        augmentations.push({ path: found.path, bottleneck: b, totalAfter: totalFlow });
    }

    return {
        totalFlow,
        flowMatrix: extractFlowMatrix(graph, residual),
        residual,
        augmentations,
    };
}
