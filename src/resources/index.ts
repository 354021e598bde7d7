/**
 * MCP Resources
 * Expose the network registry as a resource
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { NetworkRegistry } from '../registry/network-registry.js';

/**
 * Register MCP resources. Returns the number registered.
 */
export function registerResources(server: McpServer, registry: NetworkRegistry): number {
    server.resource(
        'networks',
        'flow://networks',
        async (uri) => ({
            contents: [
                {
                    uri: uri.href,
                    mimeType: 'application/json',
                    text: JSON.stringify({
                        networkCount: registry.size,
                        evictions: registry.evictionCount,
                        networks: registry.list(),
                        timestamp: new Date().toISOString(),
                    }, null, 2),
                },
            ],
        })
    );
    return 1;
}
