/**
 * Tool dispatch: validates arguments, runs the handler and shapes the result.
 * Kept free of the MCP SDK so it can be exercised directly.
 */

import {
    LogicException,
    createInvalidArgumentsError,
    serializeLogicError,
} from '../types/index.js';
import * as Handlers from '../handlers/index.js';
import {
    assertFactSchema,
    assertRuleSchema,
    checkWellFormedSchema,
    createSessionSchema,
    forwardChainSchema,
    parseToolArgs,
    querySessionSchema,
    retractRuleSchema,
    sessionOnlySchema,
} from './schemas.js';
import type { ServerContainer } from '../container.js';

export type ProgressCallback = (progress: number | undefined, message: string) => void;

type ToolHandler = (
    args: unknown,
    container: ServerContainer,
    options?: { onProgress?: ProgressCallback }
) => unknown;

export const toolHandlers: Record<string, ToolHandler> = {
    // ==================== CORE REASONING TOOLS ====================
    'forward-chain': (args, c, opts) =>
        Handlers.forwardChainHandler(parseToolArgs('forward-chain', forwardChainSchema, args), c.chainer, opts?.onProgress),

    'check-well-formed': (args) =>
        Handlers.checkWellFormedHandler(parseToolArgs('check-well-formed', checkWellFormedSchema, args)),

    // ==================== SESSION MANAGEMENT TOOLS ====================
    'create-session': (args, c) =>
        Handlers.createSessionHandler(parseToolArgs('create-session', createSessionSchema, args), c.sessionManager),

    'assert-fact': (args, c) =>
        Handlers.assertFactHandler(parseToolArgs('assert-fact', assertFactSchema, args), c.sessionManager),

    'assert-rule': (args, c) =>
        Handlers.assertRuleHandler(parseToolArgs('assert-rule', assertRuleSchema, args), c.sessionManager),

    'retract-fact': (args, c) =>
        Handlers.retractFactHandler(parseToolArgs('retract-fact', assertFactSchema, args), c.sessionManager),

    'retract-rule': (args, c) =>
        Handlers.retractRuleHandler(parseToolArgs('retract-rule', retractRuleSchema, args), c.sessionManager),

    'query-session': (args, c, opts) =>
        Handlers.querySessionHandler(parseToolArgs('query-session', querySessionSchema, args), c.sessionManager, opts?.onProgress),

    'list-knowledge': (args, c) =>
        Handlers.listKnowledgeHandler(parseToolArgs('list-knowledge', sessionOnlySchema, args), c.sessionManager),

    'clear-session': (args, c) =>
        Handlers.clearSessionHandler(parseToolArgs('clear-session', sessionOnlySchema, args), c.sessionManager),

    'delete-session': (args, c) =>
        Handlers.deleteSessionHandler(parseToolArgs('delete-session', sessionOnlySchema, args), c.sessionManager),
};

/**
 * Run one tool call and shape the MCP result, mapping errors to isError results
 */
export function callTool(
    name: string,
    args: unknown,
    container: ServerContainer,
    onProgress?: ProgressCallback
): { content: Array<{ type: 'text'; text: string }>; isError?: boolean } {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createInvalidArgumentsError(name, [`Unknown tool: ${name}`]);
        }

        const result = handler(args, container, { onProgress });

        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify(result, null, 2),
                },
            ],
        };
    } catch (error) {
        // Handle structured LogicException
        if (error instanceof LogicException) {
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(serializeLogicError(error.error), null, 2),
                    },
                ],
                isError: true,
            };
        }

        // Handle generic errors
        const errorMessage = error instanceof Error ? error.message : String(error);
        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify({
                        error: errorMessage,
                        type: error instanceof Error ? error.constructor.name : 'Error',
                    }),
                },
            ],
            isError: true,
        };
    }
}
