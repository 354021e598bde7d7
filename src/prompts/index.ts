/**
 * MCP Prompts
 * Reusable prompt templates for flow analysis
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

/**
 * Register MCP prompts. Returns the number registered.
 */
export function registerPrompts(server: McpServer): number {
    server.prompt(
        'bottleneck_analysis',
        'Find and explain the bottlenecks of a stored network',
        {
            networkId: z.string().describe('Id of a network created with flow_network_create'),
            source: z.string().describe('Source node'),
            sink: z.string().describe('Sink node'),
        },
        ({ networkId, source, sink }) => {
            return {
                messages: [
                    {
                        role: 'user' as const,
                        content: {
                            type: 'text' as const,
                            text: `Analyze the distribution network \`${networkId}\` from \`${source}\` to \`${sink}\`.

1. Call \`flow_max_flow\` with networkId "${networkId}", source "${source}" and sink "${sink}".
2. Report the maximum flow and list the min-cut edges: these are the bottlenecks.
3. For each min-cut edge, explain how raising its capacity would change the maximum flow.
4. Point out edges that carry no flow and whether their capacity is wasted.`,
                        },
                    },
                ],
            };
        }
    );
    return 1;
}
