#!/usr/bin/env node

/**
 * Supply Flow MCP Server
 * Maximum flow and source attribution for multi-tier distribution networks
 *
 * Features:
 * - Edmonds-Karp max flow with min-cut reporting
 * - Proportional source -> consumer attribution through hubs
 * - CSV and Markdown reports
 * - Bounded in-memory network registry
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigManager } from './config/index.js';
import { createFlowServer, SERVER_NAME, SERVER_VERSION } from './server.js';

/**
 * Main server initialization
 */
async function main(): Promise<void> {
    const projectRoot = process.env['SUPPLY_FLOW_PROJECT_ROOT'] ?? process.cwd();
    const config = new ConfigManager(projectRoot);
    config.watch();

    const { server, registry, tools, resourceCount, promptCount } = createFlowServer(config);

    // Create stdio transport
    const transport = new StdioServerTransport();

    // Handle shutdown
    let shuttingDown = false;
    const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        try {
            await server.close();
        } catch (e) {
            console.error('Failed to close server:', e);
        } finally {
            config.unwatch();
            registry.clear();
        }
        process.exit(0);
    };

    process.on('SIGINT', () => { void shutdown(); });
    process.on('SIGTERM', () => { void shutdown(); });

    // Connect and start server
    await server.connect(transport);

    // Log to stderr (stdout is used for MCP communication)
    console.error(`${SERVER_NAME} v${SERVER_VERSION} started`);
    console.error(`Project root: ${projectRoot}`);
    console.error(`Tools registered: ${tools.length} (${tools.join(', ')})`);
    console.error(`Resources registered: ${resourceCount}`);
    console.error(`Prompts registered: ${promptCount}`);
}

// Run server
main().catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
