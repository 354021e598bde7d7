/**
 * Flow Tools
 * Build capacitated networks, solve max flow and attribute deliveries to sources
 */

import { resolve } from 'path';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
    CapacitatedGraph,
    InvalidNetworkError,
    attributionTotals,
    decomposeFlow,
    findMinCut,
    maxFlow,
} from '../../flow/index.js';
import { solveTieredNetwork, TieredNetworkSchema } from '../../network/tiered.js';
import { buildReport, resolveOutputDir, writeReport } from '../../report/index.js';
import { summarize, type NetworkRegistry } from '../../registry/network-registry.js';
import { jsonResult, type ToolPolicy } from '../../core/tool-policy.js';
import type { ConfigManager } from '../../config/index.js';
import {
    adjacencyToRecord,
    attributionToRecord,
    flowList,
    matrixFromList,
    serializeMinCut,
} from './serialize.js';

export interface FlowToolContext {
    registry: NetworkRegistry;
    policy: ToolPolicy;
    config: ConfigManager;
}

/**
 * Register flow tools. Returns the names of the tools registered.
 */
export function registerFlowTools(server: McpServer, ctx: FlowToolContext): string[] {
    const { registry, policy, config } = ctx;
    // Schema bounds are fixed here; handlers read the live config
    const { limits } = config.getConfig();
    const registered: string[] = [];
    const enabled = (name: string) => {
        if (!config.isToolEnabled(name)) return false;
        registered.push(name);
        return true;
    };

    const EdgeInputSchema = z.object({
        from: z.string().min(1).describe('Tail node id'),
        to: z.string().min(1).describe('Head node id'),
        capacity: z.number().describe('Non-negative integer capacity'),
    });
    const EdgeListSchema = z.array(EdgeInputSchema).max(limits.maxEdges);
    const FlowEdgeSchema = z.object({
        from: z.string().min(1),
        to: z.string().min(1),
        flow: z.number().nonnegative(),
    });

    // flow_network_create - Register a new network, optionally seeded with edges
    if (enabled('flow_network_create')) {
        server.tool(
            'flow_network_create',
            'Create a capacitated network. Repeated edges accumulate capacity.',
            {
                name: z.string().optional().describe('Human readable network name'),
                edges: EdgeListSchema.optional().describe('Initial edges'),
            },
            async ({ name, edges }) => policy.run('flow_network_create', () => {
                const entry = registry.create(name, edges ?? []);
                return jsonResult({ networkId: entry.id, network: summarize(entry) });
            })
        );
    }

    // flow_network_add_edges - Accumulate edges into an existing network
    if (enabled('flow_network_add_edges')) {
        server.tool(
            'flow_network_add_edges',
            'Add edges to a network. The whole batch is rejected if any capacity is invalid.',
            {
                networkId: z.string().describe('Id returned by flow_network_create'),
                edges: EdgeListSchema.min(1),
            },
            async ({ networkId, edges }) => policy.run('flow_network_add_edges', () => {
                const entry = registry.addEdges(networkId, edges);
                return jsonResult({ network: summarize(entry) });
            })
        );
    }

    if (enabled('flow_network_delete')) {
        server.tool(
            'flow_network_delete',
            'Delete a network from the registry.',
            { networkId: z.string() },
            async ({ networkId }) => policy.run('flow_network_delete', () =>
                jsonResult({ deleted: registry.delete(networkId) })
            )
        );
    }

    // flow_max_flow - Edmonds-Karp on a stored or inline network
    if (enabled('flow_max_flow')) {
        server.tool(
            'flow_max_flow',
            'Compute maximum flow, per-edge flows and the minimum cut between source and sink (Edmonds-Karp).',
            {
                networkId: z.string().optional().describe('Stored network to solve'),
                edges: EdgeListSchema.optional().describe('Inline edges, used when networkId is absent'),
                source: z.string().min(1),
                sink: z.string().min(1),
                includeResidual: z.boolean().default(false).describe('Return the final residual graph'),
            },
            async ({ networkId, edges, source, sink, includeResidual }) => policy.run('flow_max_flow', () => {
                if ((networkId === undefined) === (edges === undefined)) {
                    throw new InvalidNetworkError('Provide exactly one of networkId or edges');
                }
                const graph = networkId !== undefined
                    ? registry.get(networkId).graph
                    : CapacitatedGraph.fromEdges(edges ?? []);
                const { maxNodes } = config.getConfig().limits;
                if (graph.nodeCount > maxNodes) {
                    throw new InvalidNetworkError(`Network has ${graph.nodeCount} nodes, limit is ${maxNodes}`);
                }

                const result = maxFlow(graph, source, sink);
                const minCut = findMinCut(graph, result.residual, source);
                return jsonResult({
                    totalFlow: result.totalFlow,
                    augmentations: result.augmentations.length,
                    flows: flowList(graph, result.flowMatrix),
                    minCut: serializeMinCut(minCut),
                    ...(includeResidual ? { residual: adjacencyToRecord(result.residual) } : {}),
                });
            })
        );
    }

    // flow_decompose - Proportional source -> consumer attribution
    if (enabled('flow_decompose')) {
        server.tool(
            'flow_decompose',
            'Attribute hub deliveries to upstream sources in proportion to each source\'s share of the hub inflow.',
            {
                upstreamFlows: z.array(FlowEdgeSchema).max(limits.maxEdges).describe('Realized flows source -> hub'),
                downstreamFlows: z.array(FlowEdgeSchema).max(limits.maxEdges).describe('Realized flows hub -> consumer'),
                precision: z.number().int().min(0).max(6).optional().describe('Round attributed values'),
            },
            async ({ upstreamFlows, downstreamFlows, precision }) => policy.run('flow_decompose', () => {
                const table = decomposeFlow(matrixFromList(upstreamFlows), matrixFromList(downstreamFlows));
                const totals = attributionTotals(table);
                return jsonResult({
                    attribution: attributionToRecord(table, precision),
                    totals: {
                        bySource: Object.fromEntries(totals.bySource),
                        byConsumer: Object.fromEntries(totals.byConsumer),
                        total: totals.total,
                    },
                });
            })
        );
    }

    // flow_tiered_solve - Sources -> hubs -> consumers, solved and attributed
    if (enabled('flow_tiered_solve')) {
        server.tool(
            'flow_tiered_solve',
            'Solve a three-tier distribution network and report which source supplies which consumer.',
            {
                network: TieredNetworkSchema.describe('Tiers, edges and optional supply/demand overrides'),
                precision: z.number().int().min(0).max(6).optional(),
                outputDir: z.string().optional().describe('Write attribution.csv and SUMMARY.md here, relative to the report output root'),
            },
            async ({ network, precision, outputDir }) => policy.run('flow_tiered_solve', () => {
                const { limits: live, report } = config.getConfig();
                const nodeCount = network.upstream.length + network.hubs.length + network.downstream.length;
                if (nodeCount > live.maxNodes) {
                    throw new InvalidNetworkError(`Network has ${nodeCount} nodes, limit is ${live.maxNodes}`);
                }
                const target = outputDir
                    ? resolveOutputDir(resolve(config.projectRoot, report.outputRoot), outputDir)
                    : undefined;

                const solution = solveTieredNetwork(network);
                const rendered = buildReport(solution, {
                    precision: precision ?? report.precision,
                    csvHeader: report.csvHeader,
                });
                const written = target ? writeReport(target, rendered) : undefined;

                return jsonResult({
                    totalFlow: solution.totalFlow,
                    minCut: serializeMinCut(solution.minCut),
                    hubThroughput: Object.fromEntries(solution.hubThroughput),
                    rows: rendered.rows,
                    csv: rendered.csv,
                    summary: rendered.summary,
                    ...(written ? { files: written } : {}),
                });
            })
        );
    }

    return registered;
}
