/**
 * Server assembly: config, registry, policy, tools, resources and prompts
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ConfigManager } from './config/index.js';
import { NetworkRegistry } from './registry/network-registry.js';
import { ToolPolicy } from './core/tool-policy.js';
import { registerFlowTools } from './tools/index.js';
import { registerResources } from './resources/index.js';
import { registerPrompts } from './prompts/index.js';

export const SERVER_NAME = 'supply-flow-server';
export const SERVER_VERSION = '1.0.0';

export interface FlowServer {
    server: McpServer;
    config: ConfigManager;
    registry: NetworkRegistry;
    policy: ToolPolicy;
    tools: string[];
    resourceCount: number;
    promptCount: number;
}

export function createFlowServer(config: ConfigManager): FlowServer {
    const settings = config.getConfig();

    const server = new McpServer({
        name: SERVER_NAME,
        version: SERVER_VERSION,
    });
    const registry = new NetworkRegistry(settings.registry);
    const policy = new ToolPolicy(settings.policy);

    // Tool toggles and edge-count bounds are fixed at registration
    config.onChange((next) => {
        policy.update(next.policy);
        console.error('Configuration reloaded, tool policy updated');
    });

    const tools = registerFlowTools(server, { registry, policy, config });
    const resourceCount = registerResources(server, registry);
    const promptCount = registerPrompts(server);

    return { server, config, registry, policy, tools, resourceCount, promptCount };
}
