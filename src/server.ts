/**
 * MCP Forward-Chaining Server
 *
 * MCP server exposing the forward-chaining engine as tools: forward-chain,
 * check-well-formed, and session management tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { TOOLS } from './tools/definitions.js';
import { callTool, ProgressCallback } from './tools/dispatch.js';
import { createContainer, ServerContainer } from './container.js';

const VERSION = '0.3.0';

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: 'mcp-forward-chain',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    // Handle list_tools request
    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // Handle call_tool request
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;
        const args = rawArgs || {};

        // Extract progress token if present
        const progressToken = request.params._meta?.progressToken;
        let reported = 0;
        const onProgress: ProgressCallback | undefined = progressToken !== undefined
            ? (progress, message) => {
                reported++;
                server.notification({
                    method: 'notifications/progress',
                    params: {
                        progressToken,
                        progress: progress ?? reported,
                        message,
                    },
                }).catch((e: unknown) => console.error('Failed to send progress notification:', e));
            }
            : undefined;

        return callTool(name, args, container, onProgress);
    });

    return server;
}

/**
 * Run the MCP server
 */
export async function runServer(): Promise<void> {
    const container = createContainer();
    const server = createServer(container);
    const transport = new StdioServerTransport();

    server.onclose = () => container.sessionManager.stop();
    await server.connect(transport);
    console.error(`mcp-forward-chain ${VERSION} listening on stdio`);
}
