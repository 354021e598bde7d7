/**
 * Proportional flow decomposition across two adjacent tiers
 *
 * Flow merging at a hub is treated as fungible: whatever leaves a hub is split
 * between the hub's suppliers in proportion to what each of them delivered
 * into it. This is an attribution, not a trace of the augmenting paths.
 */

import type { NodeId } from './graph.js';
import type { FlowMatrix } from './extractor.js';

/** upstream source -> (downstream consumer -> attributed flow) */
export type AttributionTable = Map<NodeId, Map<NodeId, number>>;

export interface AttributionTotals {
    bySource: Map<NodeId, number>;
    byConsumer: Map<NodeId, number>;
    total: number;
}

/**
 * @param upstreamFlows realized flow on edges from the upstream tier into hubs
 * @param downstreamFlows realized flow on edges from hubs to the downstream tier
 */
export function decomposeFlow(upstreamFlows: FlowMatrix, downstreamFlows: FlowMatrix): AttributionTable {
    // hub -> (upstream -> inflow)
    const inflowByHub = new Map<NodeId, Map<NodeId, number>>();
    for (const [source, row] of upstreamFlows) {
        for (const [hub, flow] of row) {
            let byHub = inflowByHub.get(hub);
            if (!byHub) {
                byHub = new Map();
                inflowByHub.set(hub, byHub);
            }
            byHub.set(source, (byHub.get(source) ?? 0) + flow);
        }
    }

    const table: AttributionTable = new Map();
    for (const [hub, deliveries] of downstreamFlows) {
        const suppliers = inflowByHub.get(hub);
        if (!suppliers) continue;

        let totalIn = 0;
        for (const f of suppliers.values()) totalIn += f;
        if (totalIn <= 0) continue;

        for (const [consumer, flow] of deliveries) {
            if (flow <= 0) continue;
            for (const [source, supplied] of suppliers) {
                if (supplied <= 0) continue;
                const share = flow * (supplied / totalIn);
                let row = table.get(source);
                if (!row) {
                    row = new Map();
                    table.set(source, row);
                }
                row.set(consumer, (row.get(consumer) ?? 0) + share);
            }
        }
    }

    return table;
}

/**
 * Restrict a flow matrix to edges running from `from` nodes to `to` nodes.
 */
export function sliceFlows(flows: FlowMatrix, from: Iterable<NodeId>, to: Iterable<NodeId>): FlowMatrix {
    const targets = new Set(to);
    const slice: FlowMatrix = new Map();
    for (const u of from) {
        const row = flows.get(u);
        if (!row) continue;
        const kept = new Map<NodeId, number>();
        for (const [v, f] of row) {
            if (targets.has(v)) kept.set(v, f);
        }
        if (kept.size > 0) slice.set(u, kept);
    }
    return slice;
}

export function attributionTotals(table: AttributionTable): AttributionTotals {
    const bySource = new Map<NodeId, number>();
    const byConsumer = new Map<NodeId, number>();
    let total = 0;
    for (const [source, row] of table) {
        for (const [consumer, value] of row) {
            bySource.set(source, (bySource.get(source) ?? 0) + value);
            byConsumer.set(consumer, (byConsumer.get(consumer) ?? 0) + value);
            total += value;
        }
    }
    return { bySource, byConsumer, total };
}
