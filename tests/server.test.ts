/**
 * End-to-end tool calls over an in-memory MCP transport
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { ConfigManager, CONFIG_FILE_NAME } from '../src/config/index.js';
import { createFlowServer, type FlowServer } from '../src/server.js';

const diamond = [
    { from: 'source', to: 'a', capacity: 5 },
    { from: 'source', to: 'b', capacity: 5 },
    { from: 'a', to: 'sink', capacity: 3 },
    { from: 'b', to: 'sink', capacity: 10 },
];

const tiered = {
    upstream: ['X', 'Y'],
    hubs: ['H'],
    downstream: ['P', 'Q'],
    supplyEdges: [{ from: 'X', to: 'H', capacity: 6 }, { from: 'Y', to: 'H', capacity: 4 }],
    deliveryEdges: [{ from: 'H', to: 'P', capacity: 7 }, { from: 'H', to: 'Q', capacity: 3 }],
};

describe('Flow MCP server', () => {
    let root: string;
    let flow: FlowServer;
    let client: Client;

    async function start(fileConfig?: unknown): Promise<void> {
        if (fileConfig !== undefined) {
            writeFileSync(join(root, CONFIG_FILE_NAME), JSON.stringify(fileConfig));
        }
        flow = createFlowServer(new ConfigManager(root, {}));
        client = new Client({ name: 'flow-test-client', version: '1.0.0' });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await flow.server.connect(serverTransport);
        await client.connect(clientTransport);
    }

    async function call(name: string, args: Record<string, unknown>): Promise<{ isError: boolean; body: unknown }> {
        const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
        const first = result.content[0];
        if (first?.type !== 'text') throw new Error(`Tool ${name} returned no text content`);
        return { isError: result.isError ?? false, body: JSON.parse(first.text) };
    }

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'supply-flow-server-'));
    });

    afterEach(async () => {
        await client.close();
        await flow.server.close();
        rmSync(root, { recursive: true, force: true });
    });

    it('should register every flow tool', async () => {
        await start();
        const { tools } = await client.listTools();

        expect(tools.map(t => t.name).sort()).toEqual([
            'flow_decompose',
            'flow_max_flow',
            'flow_network_add_edges',
            'flow_network_create',
            'flow_network_delete',
            'flow_tiered_solve',
        ]);
        expect(flow.resourceCount).toBe(1);
        expect(flow.promptCount).toBe(1);
    });

    it('should skip tools disabled in the config file', async () => {
        await start({ tools: { flow_decompose: { enabled: false } } });
        const { tools } = await client.listTools();

        expect(tools.map(t => t.name)).not.toContain('flow_decompose');
        expect(flow.tools).toHaveLength(5);
    });

    it('should build a network incrementally and solve it', async () => {
        await start();
        const created = await call('flow_network_create', { name: 'diamond', edges: diamond.slice(0, 2) });
        const { networkId } = z.object({ networkId: z.string() }).parse(created.body);

        const added = await call('flow_network_add_edges', { networkId, edges: diamond.slice(2) });
        expect(added.body).toMatchObject({ success: true, network: { name: 'diamond', nodeCount: 4, edgeCount: 4 } });

        const solved = await call('flow_max_flow', { networkId, source: 'source', sink: 'sink' });
        expect(solved.isError).toBe(false);
        expect(solved.body).toMatchObject({
            success: true,
            totalFlow: 8,
            augmentations: 2,
            flows: [
                { from: 'source', to: 'a', capacity: 5, flow: 3 },
                { from: 'source', to: 'b', capacity: 5, flow: 5 },
                { from: 'a', to: 'sink', capacity: 3, flow: 3 },
                { from: 'b', to: 'sink', capacity: 10, flow: 5 },
            ],
            minCut: { capacity: 8, sourceSide: ['a', 'source'], sinkSide: ['b', 'sink'] },
        });
    });

    it('should solve inline edges and return the residual graph', async () => {
        await start();
        const solved = await call('flow_max_flow', {
            edges: [{ from: 's', to: 't', capacity: 10 }],
            source: 's',
            sink: 't',
            includeResidual: true,
        });

        expect(solved.body).toMatchObject({ totalFlow: 10, residual: { s: { t: 0 }, t: { s: 10 } } });
    });

    it('should report engine errors with their codes', async () => {
        await start();
        const { networkId } = z.object({ networkId: z.string() })
            .parse((await call('flow_network_create', { edges: diamond })).body);

        const negative = await call('flow_network_add_edges', {
            networkId,
            edges: [{ from: 'a', to: 'b', capacity: -2 }],
        });
        expect(negative.isError).toBe(true);
        expect(negative.body).toMatchObject({ success: false, error: { code: 'INVALID_CAPACITY' } });

        const same = await call('flow_max_flow', { networkId, source: 'a', sink: 'a' });
        expect(same.body).toMatchObject({ error: { code: 'INVALID_ENDPOINTS' } });

        const neither = await call('flow_max_flow', { source: 'a', sink: 'b' });
        expect(neither.body).toMatchObject({ error: { code: 'INVALID_NETWORK' } });

        const missing = await call('flow_max_flow', { networkId: 'nope', source: 'a', sink: 'b' });
        expect(missing.body).toMatchObject({ error: { code: 'NETWORK_NOT_FOUND' } });
    });

    it('should decompose tier flows', async () => {
        await start();
        const result = await call('flow_decompose', {
            upstreamFlows: [{ from: 'X', to: 'H', flow: 6 }, { from: 'Y', to: 'H', flow: 4 }],
            downstreamFlows: [{ from: 'H', to: 'P', flow: 7 }, { from: 'H', to: 'Q', flow: 3 }],
            precision: 1,
        });

        expect(result.body).toMatchObject({
            success: true,
            attribution: { X: { P: 4.2, Q: 1.8 }, Y: { P: 2.8, Q: 1.2 } },
        });
    });

    it('should solve a tiered network and write the report', async () => {
        await start();
        const outputDir = join(root, 'report');
        const result = await call('flow_tiered_solve', {
            network: tiered,
            outputDir: 'report',
        });

        expect(result.body).toMatchObject({
            success: true,
            totalFlow: 10,
            hubThroughput: { H: 10 },
            csv: 'Source,Consumer,Flow\nX,P,4\nX,Q,2\nY,P,3\nY,Q,1\n',
        });
        expect(existsSync(join(outputDir, 'SUMMARY.md'))).toBe(true);
        expect(readFileSync(join(outputDir, 'attribution.csv'), 'utf-8')).toBe('Source,Consumer,Flow\nX,P,4\nX,Q,2\nY,P,3\nY,Q,1\n');
    });

    it('should refuse report directories outside the output root', async () => {
        await start({ report: { outputRoot: 'reports' } });
        const result = await call('flow_tiered_solve', { network: tiered, outputDir: '../escaped' });

        expect(result.isError).toBe(true);
        expect(result.body).toMatchObject({ success: false, error: { code: 'INVALID_OUTPUT_PATH' } });
        expect(existsSync(join(root, 'escaped'))).toBe(false);
    });

    it('should apply reloaded limits and report settings', async () => {
        await start();
        writeFileSync(join(root, CONFIG_FILE_NAME), JSON.stringify({
            limits: { maxNodes: 3 },
            report: { precision: 1 },
        }));
        flow.config.reload();

        const solved = await call('flow_tiered_solve', { network: { ...tiered, downstream: ['P'], deliveryEdges: tiered.deliveryEdges.slice(0, 1) } });
        expect(solved.body).toMatchObject({ error: { code: 'INVALID_NETWORK', message: 'Network has 4 nodes, limit is 3' } });

        const inline = await call('flow_max_flow', { edges: diamond, source: 'source', sink: 'sink' });
        expect(inline.body).toMatchObject({ error: { code: 'INVALID_NETWORK', message: 'Network has 4 nodes, limit is 3' } });

        writeFileSync(join(root, CONFIG_FILE_NAME), JSON.stringify({ report: { precision: 1 } }));
        flow.config.reload();
        const rounded = await call('flow_tiered_solve', { network: tiered });
        expect(rounded.body).toMatchObject({ csv: 'Source,Consumer,Flow\nX,P,4.2\nX,Q,1.8\nY,P,2.8\nY,Q,1.2\n' });
    });

    it('should refuse denied tools', async () => {
        await start({ policy: { denylist: ['flow_network_*'] } });
        const result = await call('flow_network_create', {});

        expect(result.isError).toBe(true);
        expect(result.body).toEqual({
            success: false,
            error: { code: 'TOOL_FORBIDDEN', message: 'Tool flow_network_create not allowed' },
        });
    });

    it('should list stored networks as a resource', async () => {
        await start();
        await call('flow_network_create', { name: 'one', edges: diamond });

        const { contents } = await client.readResource({ uri: 'flow://networks' });
        const first = contents[0];
        const text = first && 'text' in first && typeof first.text === 'string' ? first.text : '{}';

        expect(JSON.parse(text)).toMatchObject({
            networkCount: 1,
            networks: [{ name: 'one', nodeCount: 4, edgeCount: 4 }],
        });
    });

    it('should render the bottleneck prompt', async () => {
        await start();
        const { messages } = await client.getPrompt({
            name: 'bottleneck_analysis',
            arguments: { networkId: 'net-1', source: 'SRC', sink: 'SNK' },
        });
        const content = messages[0]?.content;

        expect(content?.type).toBe('text');
        if (content?.type === 'text') {
            expect(content.text).toContain('Call `flow_max_flow` with networkId "net-1", source "SRC" and sink "SNK".');
        }
    });
});
