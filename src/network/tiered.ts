/**
 * Three-tier distribution networks
 *
 * Upstream sources feed hubs, hubs feed downstream consumers. The network is
 * closed with a synthetic super source in front of the upstream tier and a
 * super sink behind the downstream tier, solved as a single-source max-flow
 * problem, and the result is attributed back from consumers to sources.
 */

import { z } from 'zod';
import {
    CapacitatedGraph,
    InvalidNetworkError,
    attributionTotals,
    decomposeFlow,
    findMinCut,
    maxFlow,
    sliceFlows,
    type AttributionTable,
    type AttributionTotals,
    type FlowMatrix,
    type MinCut,
    type NodeId,
} from '../flow/index.js';

/** Demand given to a consumer with no incoming delivery edge */
export const UNBOUNDED_DEMAND = 1_000_000_000;

export const TierEdgeSchema = z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    capacity: z.number().int().nonnegative(),
});

export const TieredNetworkSchema = z.object({
    upstream: z.array(z.string().min(1)).min(1),
    hubs: z.array(z.string().min(1)).min(1),
    downstream: z.array(z.string().min(1)).min(1),
    supplyEdges: z.array(TierEdgeSchema),
    deliveryEdges: z.array(TierEdgeSchema),
    /** Capacity of super source -> upstream node; defaults to its outgoing capacity */
    supply: z.record(z.number().int().nonnegative()).optional(),
    /** Capacity of downstream node -> super sink; defaults to its incoming capacity */
    demand: z.record(z.number().int().nonnegative()).optional(),
    superSource: z.string().min(1).default('SRC'),
    superSink: z.string().min(1).default('SNK'),
});

export type TierEdge = z.infer<typeof TierEdgeSchema>;
export type TieredNetwork = z.infer<typeof TieredNetworkSchema>;
export type TieredNetworkInput = z.input<typeof TieredNetworkSchema>;

export interface TieredSolution {
    network: TieredNetwork;
    graph: CapacitatedGraph;
    totalFlow: number;
    flowMatrix: FlowMatrix;
    minCut: MinCut;
    supplyFlows: FlowMatrix;
    deliveryFlows: FlowMatrix;
    attribution: AttributionTable;
    totals: AttributionTotals;
    /** Flow passing through each hub */
    hubThroughput: Map<NodeId, number>;
}

function validateTiers(network: TieredNetwork): void {
    const tierOf = new Map<NodeId, string>();
    const tiers: Array<[string, string[]]> = [
        ['upstream', network.upstream],
        ['hubs', network.hubs],
        ['downstream', network.downstream],
    ];
    for (const [tier, nodes] of tiers) {
        for (const node of nodes) {
            const seen = tierOf.get(node);
            if (seen) {
                throw new InvalidNetworkError(`Node ${node} is listed in both ${seen} and ${tier}`);
            }
            tierOf.set(node, tier);
        }
    }

    if (network.superSource === network.superSink) {
        throw new InvalidNetworkError(`Super source and super sink must differ, both are ${network.superSource}`);
    }
    for (const terminal of [network.superSource, network.superSink]) {
        if (tierOf.has(terminal)) {
            throw new InvalidNetworkError(`Node ${terminal} clashes with the super source/sink name`);
        }
    }

    const checkEdges = (edges: TierEdge[], fromTier: string, toTier: string) => {
        for (const e of edges) {
            if (tierOf.get(e.from) !== fromTier || tierOf.get(e.to) !== toTier) {
                throw new InvalidNetworkError(`Edge ${e.from} -> ${e.to} must run from ${fromTier} to ${toTier}`);
            }
        }
    };
    checkEdges(network.supplyEdges, 'upstream', 'hubs');
    checkEdges(network.deliveryEdges, 'hubs', 'downstream');

    for (const [label, overrides, nodes] of [
        ['supply', network.supply, network.upstream],
        ['demand', network.demand, network.downstream],
    ] as const) {
        const allowed = new Set<string>(nodes);
        for (const node of Object.keys(overrides ?? {})) {
            if (!allowed.has(node)) {
                throw new InvalidNetworkError(`${label} given for unknown node ${node}`);
            }
        }
    }
}

function override(values: Record<string, number> | undefined, node: NodeId): number | undefined {
    return values !== undefined && Object.hasOwn(values, node) ? values[node] : undefined;
}

/**
 * Build the closed single-source single-sink graph for a tiered network.
 */
export function buildTieredGraph(input: TieredNetworkInput): { network: TieredNetwork; graph: CapacitatedGraph } {
    const network = TieredNetworkSchema.parse(input);
    validateTiers(network);

    const inner = CapacitatedGraph.fromEdges([...network.supplyEdges, ...network.deliveryEdges]);

    const incoming = new Map<NodeId, number>();
    for (const e of network.deliveryEdges) {
        incoming.set(e.to, (incoming.get(e.to) ?? 0) + e.capacity);
    }

    const graph = new CapacitatedGraph();
    for (const u of network.upstream) {
        graph.addEdge(network.superSource, u, override(network.supply, u) ?? inner.outgoingCapacity(u));
    }
    graph.addEdges([...network.supplyEdges, ...network.deliveryEdges]);
    for (const d of network.downstream) {
        const fallback = incoming.get(d) ?? 0;
        graph.addEdge(d, network.superSink, override(network.demand, d) ?? (fallback > 0 ? fallback : UNBOUNDED_DEMAND));
    }

    return { network, graph };
}

export function solveTieredNetwork(input: TieredNetworkInput): TieredSolution {
    const { network, graph } = buildTieredGraph(input);
    const result = maxFlow(graph, network.superSource, network.superSink);

    const supplyFlows = sliceFlows(result.flowMatrix, network.upstream, network.hubs);
    const deliveryFlows = sliceFlows(result.flowMatrix, network.hubs, network.downstream);
    const attribution = decomposeFlow(supplyFlows, deliveryFlows);

    const hubThroughput = new Map<NodeId, number>();
    for (const hub of network.hubs) {
        let through = 0;
        for (const f of deliveryFlows.get(hub)?.values() ?? []) through += f;
        hubThroughput.set(hub, through);
    }

    return {
        network,
        graph,
        totalFlow: result.totalFlow,
        flowMatrix: result.flowMatrix,
        minCut: findMinCut(graph, result.residual, network.superSource),
        supplyFlows,
        deliveryFlows,
        attribution,
        totals: attributionTotals(attribution),
        hubThroughput,
    };
}
